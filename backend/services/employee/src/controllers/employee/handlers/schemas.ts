// backend/services/employee/src/controllers/employee/handlers/schemas.ts
/**
 * Localized schema imports for handlers.
 * (No export *; explicit named exports only.)
 */
export { createEmployeeDto, findByIdDto } from "../../../validators/employee.dto";
