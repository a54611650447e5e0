import { NextFunction, Request, Response } from "express";
import logger from "../../lib/logger";

// Error class for structured error handling
export class HttpError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

// Error handling middleware
export const errorHandler = (
  err: Error | HttpError,
  req: Request,
  res: Response,
  _next: NextFunction,
) => {
  const statusCode = err instanceof HttpError ? err.statusCode : 500;
  const context = {
    url: req.originalUrl,
    method: req.method,
    statusCode,
  };

  if (statusCode >= 500) logger.error(`[API] ${req.method} ${req.originalUrl}: ${err.message}`);

  res.status(statusCode).json({
    data: {
      ...context,
      stack: process.env.NODE_ENV !== "production" ? err.stack : undefined,
    },
    message: err.message,
    error: true,
  });
};
