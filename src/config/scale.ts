const scale = {
  rateLimiting: {
    windowMs: 60_000, // 1 minute window
    maxRequests: 1000, // Limit each IP to 1000 requests per window
  },
  database: {
    timeout: 30_000, // 30 second busy timeout
  },
  fetching: {
    requestsPerSecond: 1, // per host
    httpTimeout: 30_000,
    maxContentLength: 1_000_000, // characters of decoded HTML kept
    extractedTextLength: 10_000,
    minExtractedTextLength: 50,
    userAgent: "DailyLinks/1.0",
  },
  pdf: {
    maxPages: 50,
    maxContentLength: 50_000,
  },
  pipeline: {
    batchSize: process.env.NODE_ENV === "production" ? 100 : 50,
    emptyContentThreshold: 50,
  },
  enrichment: {
    model: "gpt-4o-mini",
    summaryMaxTokens: 300,
    summaryInputLength: 8_000,
    tagMaxTokens: 500,
  },
  search: {
    pageSize: 25,
    maxResults: 100,
  },
};

export default scale;
