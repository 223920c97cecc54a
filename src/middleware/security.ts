// src/middleware/security.ts
import rateLimit from "express-rate-limit";
import sanitize from "mongo-sanitize";
import { Request, Response, NextFunction } from "express";

export const loginRateLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  max: 5,
  message: {
    message: "Too many attempts. Access locked for 15m.",
  },
  standardHeaders: true,
  legacyHeaders: false,
});

export const apiRateLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  max: 1000,
  standardHeaders: true,
  legacyHeaders: false,
  message: { message: "Too many requests from this IP. Please try again later." },
});

// Strips `$`-prefixed keys so request data cannot smuggle query operators
export const sanitizeInput = (req: Request, _res: Response, next: NextFunction) => {
  if (req.body) {
    req.body = sanitize(req.body);
  }

  for (const key of Object.keys(req.query)) {
    req.query[key] = sanitize(req.query[key]);
  }

  for (const key of Object.keys(req.params)) {
    req.params[key] = sanitize(req.params[key]);
  }

  next();
};
