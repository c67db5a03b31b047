// backend/services/employee/src/mappers/employee.mapper.ts
import type { Employee } from "../contracts/employee";

/** Row as returned by pg (int8 would arrive as string). */
export interface EmployeeRow {
  id: number | string;
  name: string;
}

export function dbToDomain(row: EmployeeRow): Employee {
  return {
    id: Number(row.id),
    name: row.name,
  };
}
