export * as patientFields from "./patient-fields"
export * as patientChat from "./patient-chat"
