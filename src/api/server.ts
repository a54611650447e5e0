import express, { NextFunction, Request, Response } from "express";
import rateLimit from "express-rate-limit";
import type { Server } from "http";
import scale from "../config/scale";
import logger from "../lib/logger";
import type { LinkRepository } from "../storage/LinkRepository";
import type { LinkQueryParams } from "../types";
import { errorHandler, HttpError } from "./lib/error";
import { parseDate, parsePositiveInt, parseSort, toList } from "./lib/helpers";

/**
 * Read-only JSON API over the link store. Every response is wrapped as
 * `{ data, message, error }`.
 */
export function createApp(repository: LinkRepository) {
  const app = express();
  app.use(express.json());

  // Add rate limiting middleware
  const apiLimiter = rateLimit({
    windowMs: scale.rateLimiting.windowMs,
    limit: scale.rateLimiting.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use(apiLimiter);

  app.get(
    "/links",
    (req: Request<object, object, object, LinkQueryParams>, res: Response, next: NextFunction) => {
      try {
        const { page, sort, tag, domain, dateFrom, dateTo } = req.query;

        const result = repository.getLinksPaginated({
          page: parsePositiveInt(page, "page", 1),
          perPage: scale.search.pageSize,
          sort: parseSort(sort),
          tags: toList(tag),
          domain: domain || undefined,
          dateFrom: parseDate(dateFrom, "dateFrom"),
          dateTo: parseDate(dateTo, "dateTo"),
        });

        res.send({
          data: {
            totalResultsCount: result.total,
            results: result.links,
            page: result.page,
            totalPages: result.totalPages,
          },
          message: "Successfully retrieved links",
          error: false,
        });
      } catch (error) {
        next(error);
      }
    },
  );

  app.get("/links/:id", (req: Request<{ id: string }>, res: Response, next: NextFunction) => {
    try {
      const link = repository.getLinkById(req.params.id);
      if (!link) throw new HttpError("Link not found", 404);

      res.send({
        data: { ...link, tags: repository.getTagsForLink(link.id) },
        message: "Successfully retrieved link",
        error: false,
      });
    } catch (error) {
      next(error);
    }
  });

  app.get(
    "/search",
    (
      req: Request<object, object, object, { q?: string; limit?: string }>,
      res: Response,
      next: NextFunction,
    ) => {
      try {
        const query = req.query.q?.trim();
        if (!query) throw new HttpError("Query parameter `q` required", 400);

        const limit = Math.min(
          parsePositiveInt(req.query.limit, "limit", scale.search.pageSize),
          scale.search.maxResults,
        );
        const results = repository.search(query, limit);

        res.send({
          data: { query, totalResultsCount: results.length, results },
          message: "Successfully searched links",
          error: false,
        });
      } catch (error) {
        next(error);
      }
    },
  );

  app.get("/tags", (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.send({
        data: repository.getAllTags(),
        message: "Successfully retrieved tags",
        error: false,
      });
    } catch (error) {
      next(error);
    }
  });

  app.get("/stats", (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.send({
        data: {
          ...repository.getStats(),
          domains: repository.getAllDomains(),
          dates: repository.getDateCounts(),
        },
        message: "Successfully retrieved stats",
        error: false,
      });
    } catch (error) {
      next(error);
    }
  });

  app.use((req: Request, _res: Response, next: NextFunction) => {
    next(new HttpError(`Route ${req.method} ${req.path} not found`, 404));
  });

  // Error Handler Middleware
  app.use(errorHandler);

  return app;
}

export function startServer(repository: LinkRepository, port: number): Server {
  const app = createApp(repository);
  return app.listen(port, () => logger.info(`API running on port: ${port}`));
}
