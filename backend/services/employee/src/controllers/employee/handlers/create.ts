// backend/services/employee/src/controllers/employee/handlers/create.ts
import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { Database } from "../../../db";
import * as repo from "../../../repo/employeeRepo";
import { createEmployeeDto } from "./schemas";

/**
 * Create Employee
 * - One row, one transaction; the database assigns `id`.
 */
export function create(db: Database): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    req.log.debug({ requestId: req.id }, "[employee.controller.create] enter");
    try {
      const dto = createEmployeeDto.parse(req.body);

      const created = await db.withTransaction((s) => repo.create(s, dto.name));

      req.log.debug(
        { requestId: req.id, id: created.id },
        "[employee.controller.create] exit"
      );
      res.status(201).json(created);
    } catch (err) {
      next(err);
    }
  };
}
