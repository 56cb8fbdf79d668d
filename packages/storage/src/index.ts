export { openDatabase, resolveDatabasePath, DEFAULT_DB_PATH, IN_MEMORY } from "./database"
export type { SqliteDatabase } from "./database"
export { PatientStore, EDITABLE_FIELDS, isEditableField } from "./patient-store"
export { AuditLog } from "./audit-log"
export { debugLog, debugLogPHI, debugError, debugWarn } from "./debug-logger"
export type * from "./types"
