export { createDatabase, type LedgerDatabase } from "./db.js";
export * from "./schema.js";
export { UserRepo } from "./repos/UserRepo.js";
export { ExpenseRepo } from "./repos/ExpenseRepo.js";
export { LedgerRepo } from "./repos/LedgerRepo.js";
export { isUniqueViolation, isForeignKeyViolation } from "./errors.js";
