export enum SubmissionState {
  SENT = "SENT",
  LANDED = "LANDED",
  DROPPED = "DROPPED",
}

export enum ReasonCategory {
  NETWORK = "NETWORK",
  DATA = "DATA",
  SOLVER = "SOLVER",
  SUBMIT = "SUBMIT",
  CONFIG = "CONFIG",
  INTERNAL = "INTERNAL",
}

export type ReasonCode =
  | "NETWORK_RPC_UNAVAILABLE"
  | "NETWORK_ACCOUNT_INVALID"
  | "DATA_BALANCE_MISSING"
  | "SOLVER_FAILED"
  | "SOLVER_DEADLINE"
  | "SUBMIT_RELAY_REJECTED"
  | "SUBMIT_SIMULATION_FAILED"
  | "BUNDLE_LIMIT"
  | "CONFIG_INVALID"
  | "INTERNAL_ERROR";

export interface ReasonDetail {
  code: ReasonCode;
  category: ReasonCategory;
  retryable: boolean;
  message: string;
  context?: Record<string, string | number | boolean>;
}
