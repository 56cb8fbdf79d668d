export { renderChangeSummary, renderPatientReport } from "./render"
