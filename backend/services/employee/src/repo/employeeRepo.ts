// backend/services/employee/src/repo/employeeRepo.ts
import type { Session } from "../db";
import type { Employee } from "../contracts/employee";
import { dbToDomain, type EmployeeRow } from "../mappers/employee.mapper";

/**
 * Repo layer: returns domain objects only (no raw rows).
 * The caller owns the session and its transaction.
 */
export async function create(session: Session, name: string): Promise<Employee> {
  const res = await session.query<EmployeeRow>(
    "INSERT INTO employees (name) VALUES ($1) RETURNING id, name",
    [name]
  );
  const row = res.rows[0];
  if (!row) throw new Error("INSERT into employees returned no row");
  return dbToDomain(row);
}

export async function findById(
  session: Session,
  id: number
): Promise<Employee | null> {
  const res = await session.query<EmployeeRow>(
    "SELECT id, name FROM employees WHERE id = $1",
    [id]
  );
  const row = res.rows[0];
  return row ? dbToDomain(row) : null;
}
