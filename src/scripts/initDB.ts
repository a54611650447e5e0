import { loadSettings } from "../config/settings";
import { errorMessage } from "../lib/helpers";
import logger from "../lib/logger";
import initializeDatabase from "../services/initializeDB";

try {
  const settings = loadSettings();
  const db = initializeDatabase(settings.databasePath);
  db.close();
} catch (error) {
  logger.error(`Failed to initialize database: ${errorMessage(error)}`);
  process.exitCode = 1;
}
