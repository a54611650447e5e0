import winston from "winston";

// Winston logger instance
const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  silent: process.env.NODE_ENV === "test",
  transports: [new winston.transports.Console()],
  format: winston.format.combine(
    winston.format.cli(),
    // winston.format.prettyPrint() // Uncomment for more detailed info
  ),
});

export default logger;
