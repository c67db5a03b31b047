// backend/services/shared/test/problemJson.spec.ts
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import request from "supertest";
import pino from "pino";
import { beforeAll, describe, it, expect } from "vitest";
import { makeHttpLogger } from "../middleware/httpLogger";
import { errorProblemJson, notFoundProblemJson } from "../middleware/problemJson";
import { createHealthRouter } from "../health";

let app: Express;

beforeAll(() => {
  app = express();
  app.use(makeHttpLogger("problem-test", pino({ level: "silent" })));
  app.use(express.json());

  app.get("/__conflict", (_req: Request, _res: Response, next: NextFunction) => {
    next(Object.assign(new Error("already there"), { statusCode: 409 }));
  });
  app.get("/__nonfinite", (_req: Request, _res: Response, next: NextFunction) => {
    next(Object.assign(new Error("weird status"), { status: "not-a-number" }));
  });
  app.get("/__string", (_req: Request, _res: Response, next: NextFunction) => {
    next("plain string failure");
  });
  app.get("/__throw", () => {
    throw new Error("boom");
  });
  app.use(
    createHealthRouter({
      probe: async () => {
        throw new Error("probe exploded");
      },
    })
  );

  app.use(notFoundProblemJson(["/api"]));
  app.use(errorProblemJson());
});

describe("errorProblemJson", () => {
  it("keeps a 4xx status from the error and echoes its message", async () => {
    const r = await request(app).get("/__conflict").expect(409);
    expect(r.headers["content-type"]).toContain("application/problem+json");
    expect(r.body).toMatchObject({
      type: "about:blank",
      title: "Request Error",
      status: 409,
      detail: "already there",
    });
  });

  it("falls back to 500 for a non-numeric status", async () => {
    const r = await request(app).get("/__nonfinite").expect(500);
    expect(r.body.title).toBe("Internal Server Error");
    expect(r.body.detail).toBe("weird status");
  });

  it("uses a generic detail for non-Error values", async () => {
    const r = await request(app).get("/__string").expect(500);
    expect(r.body.detail).toBe("Unexpected error");
  });

  it("formats synchronous throws", async () => {
    const r = await request(app).get("/__throw").expect(500);
    expect(r.body.detail).toBe("boom");
  });
});

describe("notFoundProblemJson", () => {
  it("Problem+JSON under a known prefix, bare 404 elsewhere", async () => {
    const api = await request(app).get("/api/missing").expect(404);
    expect(api.body.detail).toBe("Route not found");

    const other = await request(app).get("/missing").expect(404);
    expect(other.text).toBe("");
  });
});

describe("createHealthRouter", () => {
  it("reports the dependency down when the probe throws", async () => {
    const r = await request(app).get("/health").expect(503);
    expect(r.body).toEqual({ status: "ok", db: "down" });
  });
});
