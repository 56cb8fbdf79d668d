export { runVisitSession } from "./session"
export type {
  PatientRepository,
  VisitSessionDeps,
  VisitSessionResult,
  VisitSessionSignals,
  VisitSessionStatus,
} from "./session"
export { SessionController } from "./controller"
export type { SessionRunner, SessionState, SessionStatus } from "./controller"
export { FileArtifactWriter, formatArtifactStamp } from "./artifacts"
export type { ArtifactWriter, SessionArtifactPaths, SessionArtifacts } from "./artifacts"
export { resolveVisitConfig, DEFAULT_OUTPUT_DIR } from "./config"
export type { VisitConfig } from "./config"
