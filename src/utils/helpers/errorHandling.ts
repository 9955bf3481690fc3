import type { NextFunction, Request, Response } from "express";
import { validationResult } from "express-validator";
import { isEmpty } from "lodash";
import {
  BAD_REQUEST,
  DATA_VALIDATION,
  EMPTY_BODY,
  NOT_ACCEPTABLE,
  UNPROCESSABLE_ENTITY,
} from "../common/responseCodes";

export const checkReqDataError = (
  req: Request,
  res: Response,
  next: NextFunction,
) => {
  const errors = validationResult(req);
  if (!errors.isEmpty()) {
    return res
      .status(UNPROCESSABLE_ENTITY)
      .json({ ...DATA_VALIDATION, ERRORS: errors.array() });
  }
  return next();
};

export const checkReqBodyInput = (
  req: Request,
  res: Response,
  next: NextFunction,
) => {
  if (isEmpty(req.body) && ["PUT", "POST"].includes(req.method)) {
    return res.status(NOT_ACCEPTABLE).json({
      ...EMPTY_BODY,
      statusCode: NOT_ACCEPTABLE,
    });
  }
  return next();
};

function isJsonParseError(err: unknown): boolean {
  if (err instanceof SyntaxError && "body" in err) return true;
  return (
    typeof err === "object" &&
    err !== null &&
    "type" in err &&
    err.type === "entity.parse.failed"
  );
}

export const jsonParseErrorHandler = (
  err: unknown,
  _req: Request,
  res: Response,
  next: NextFunction,
) => {
  if (isJsonParseError(err)) {
    return res.status(BAD_REQUEST).json({
      error: "INVALID_JSON",
      message:
        err instanceof Error
          ? err.message
          : "Bad control character in string literal in JSON",
    });
  }
  return next(err);
};
