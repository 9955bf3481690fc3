import type { NextFunction, Request, RequestHandler, Response } from "express";
import morgan from "morgan";

/** Request logging; `none` turns it off (used by the test suite). */
export function Logging(format: string): RequestHandler {
  if (format === "none") {
    return function (_req: Request, _res: Response, next: NextFunction) {
      next();
    };
  }
  return morgan(format);
}
