export enum AirlineState {
  APPLIED = "APPLIED",
  REGISTERED = "REGISTERED",
  PAID = "PAID",
}

export enum PolicyStatus {
  ACTIVE = "ACTIVE",
  CLOSED = "CLOSED",
}

export enum PolicyResolution {
  NONE = "NONE",
  CREDITED = "CREDITED",
  CLOSED = "CLOSED",
}

// Oracle status codes as reported for a flight
export enum FlightStatusCode {
  UNKNOWN = 0,
  ON_TIME = 10,
  LATE_AIRLINE = 20,
  LATE_WEATHER = 30,
  LATE_TECHNICAL = 40,
  LATE_OTHER = 50,
}

export enum Role {
  AUTHORITY = "AUTHORITY",
  AUTHORIZED_CALLER = "AUTHORIZED_CALLER",
  ANY = "ANY",
}

export enum ReasonCategory {
  CLIENT = "CLIENT",
  GATE = "GATE",
  AUTH = "AUTH",
  GOVERNANCE = "GOVERNANCE",
  POLICY = "POLICY",
  SETTLEMENT = "SETTLEMENT",
  INTERNAL = "INTERNAL",
}

export type ReasonCode =
  | "CLIENT_BAD_REQUEST"
  | "CLIENT_NOT_FOUND"
  | "VALIDATION_SCHEMA_FAIL"
  | "NOT_OPERATIONAL"
  | "NOT_AUTHORIZED"
  | "NOT_ELIGIBLE_VOTER"
  | "NOT_ELIGIBLE_AIRLINE"
  | "INVALID_AMOUNT"
  | "FLIGHT_NOT_FOUND"
  | "FLIGHT_STATUS_UNKNOWN"
  | "SETTLEMENT_FAILED"
  | "PERSISTENCE_FAILED"
  | "INTERNAL_ERROR";

export interface ReasonDetail {
  code: ReasonCode;
  category: ReasonCategory;
  http_status: number;
  message: string;
  context?: Record<string, string | number | boolean>;
}

export interface ErrorEnvelope {
  corr_id: string;
  operation?: string;
  reason: ReasonDetail;
  ts: string; // RFC3339 UTC
}
