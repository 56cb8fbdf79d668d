/**
 * Patient field extraction prompt exports
 * Central location for managing prompt versions
 */

import * as v1 from "./v1"

// Default to latest version
export const currentVersion = v1

export { v1 }

export type { PatientFieldsPromptParams, ExtractableField } from "./v1"
