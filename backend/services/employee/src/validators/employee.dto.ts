// backend/services/employee/src/validators/employee.dto.ts
import { z } from "zod";
import { employeeContract, MAX_EMPLOYEE_ID } from "../contracts/employee";

/**
 * CREATE (API surface): caller supplies only `name`; unknown keys are dropped.
 */
export const createEmployeeDto = employeeContract.pick({ name: true });

/**
 * PARAMS: /:id (canonical decimal, positive, fits the id column)
 */
export const findByIdDto = z.object({
  id: z
    .string()
    .regex(/^[1-9]\d*$/, "id must be a positive decimal integer")
    .transform(Number)
    .pipe(z.number().int().max(MAX_EMPLOYEE_ID)),
});

export type CreateEmployeeDto = z.infer<typeof createEmployeeDto>;
export type FindByIdDto = z.infer<typeof findByIdDto>;
