// backend/services/employee/src/contracts/employee.ts
import { z } from "zod";

/** INTEGER column upper bound. */
export const MAX_EMPLOYEE_ID = 2_147_483_647;

/** VARCHAR(255) counts characters, not UTF-16 code units. */
export const MAX_NAME_CHARS = 255;

export const employeeName = z
  .string()
  .superRefine((s, ctx) => {
    if ([...s].length > MAX_NAME_CHARS) {
      ctx.addIssue({
        code: z.ZodIssueCode.too_big,
        maximum: MAX_NAME_CHARS,
        type: "string",
        inclusive: true,
        message: `name must be at most ${MAX_NAME_CHARS} characters`,
      });
    }
  })
  .refine((s) => s.trim().length > 0, { message: "name must not be empty" });

/** Wire + domain shape of an employee. */
export const employeeContract = z.object({
  id: z.number().int().positive().max(MAX_EMPLOYEE_ID),
  name: employeeName,
});

export type Employee = z.infer<typeof employeeContract>;
