// backend/services/shared/middleware/problemJson.ts

/**
 * RFC 7807 Problem+JSON formatting for 404s and every error passed to next().
 *
 * - ZodError               → 422 with an `errors` array ({path, code, message})
 * - body-parser bad JSON   → 400 "Malformed JSON body"
 * - err.status/statusCode  → that status (4xx message is echoed)
 * - anything else          → 500; message hidden in production
 *
 * 404s are only formatted for known prefixes; other paths get a bare 404.
 */

import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { extractLogContext } from "../utils/logger";

const IS_PROD = String(process.env.NODE_ENV || "").trim() === "production";

export interface ProblemBody {
  type: string;
  title: string;
  status: number;
  detail: string;
  instance?: string;
  code?: string;
  errors?: Array<{ path: string; code: string; message: string }>;
}

function instanceOf(req: Request): string | undefined {
  return typeof req.id === "string" ? req.id : undefined;
}

export function sendProblem(
  req: Request,
  res: Response,
  problem: Omit<ProblemBody, "type" | "instance"> & { type?: string }
): void {
  res
    .status(problem.status)
    .type("application/problem+json")
    .json({
      type: "about:blank",
      ...problem,
      instance: instanceOf(req),
    });
}

export function notFoundProblemJson(validPrefixes: string[]) {
  return (req: Request, res: Response) => {
    if (validPrefixes.some((p) => req.path.startsWith(p))) {
      sendProblem(req, res, {
        title: "Not Found",
        status: 404,
        detail: "Route not found",
      });
      return;
    }
    res.status(404).end();
  };
}

function readField(err: unknown, key: string): unknown {
  if (typeof err !== "object" || err === null) return undefined;
  return Object.prototype.hasOwnProperty.call(err, key)
    ? Reflect.get(err, key)
    : undefined;
}

function statusOf(err: unknown): number {
  const raw = readField(err, "statusCode") ?? readField(err, "status");
  const n = Number(raw ?? 500);
  return Number.isInteger(n) && n >= 400 && n <= 599 ? n : 500;
}

function messageOf(err: unknown): string {
  if (err instanceof Error && err.message) return err.message;
  return "Unexpected error";
}

export function errorProblemJson() {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ZodError) {
      req.log.warn(
        { issues: err.issues.length, path: req.originalUrl },
        "validation failed"
      );
      sendProblem(req, res, {
        title: "Unprocessable Entity",
        status: 422,
        code: "VALIDATION_FAILED",
        detail: "Validation failed",
        errors: err.issues.map((i) => ({
          path: i.path.join("."),
          code: i.code,
          message: i.message,
        })),
      });
      return;
    }

    if (readField(err, "type") === "entity.parse.failed") {
      sendProblem(req, res, {
        title: "Bad Request",
        status: 400,
        code: "MALFORMED_JSON",
        detail: "Malformed JSON body",
      });
      return;
    }

    const status = statusOf(err);
    if (status >= 500) {
      req.log.error(
        { ...extractLogContext(req), status, err },
        "request error"
      );
    }

    sendProblem(req, res, {
      title: status >= 500 ? "Internal Server Error" : "Request Error",
      status,
      detail: status >= 500 && IS_PROD ? "Unexpected error" : messageOf(err),
    });
  };
}
