// backend/services/employee/src/controllers/employee/handlers/findById.ts
import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { Database } from "../../../db";
import * as repo from "../../../repo/employeeRepo";
import { sendProblem } from "../../../../../shared/middleware/problemJson";
import { findByIdDto } from "./schemas";

export function findById(db: Database): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = findByIdDto.parse(req.params);
      req.log.debug({ requestId: req.id, id }, "[employee.controller.findbyid] enter");

      const found = await db.withSession((s) => repo.findById(s, id));
      if (!found) {
        sendProblem(req, res, {
          title: "Not Found",
          status: 404,
          code: "NOT_FOUND",
          detail: "Employee not found",
        });
        return;
      }
      req.log.debug({ requestId: req.id, id }, "[employee.controller.findbyid] exit");
      res.json(found);
    } catch (err) {
      next(err);
    }
  };
}
