// src/core/status.ts
//
// Status code space shared by generated code and the runtime ABI.
// Append new codes at the end; never renumber.

export enum StatusCode {
  SUCCESS = 0,
  GENERIC_ERROR = 1,
  ACCESS_DENIED = 2,
  TIMEOUT = 3,
  NOT_FOUND = 4,
  INVALID_PARAMETER = 5,
  OUT_OF_MEMORY = 6,
  BUFFER_TOO_SMALL = 7,
  NOT_IMPLEMENTED = 8,
}

export type StatusName = keyof typeof StatusCode;

export const STATUS_NAMES: readonly StatusName[] = [
  "SUCCESS",
  "GENERIC_ERROR",
  "ACCESS_DENIED",
  "TIMEOUT",
  "NOT_FOUND",
  "INVALID_PARAMETER",
  "OUT_OF_MEMORY",
  "BUFFER_TOO_SMALL",
  "NOT_IMPLEMENTED",
];

export function isStatusName(name: string): name is StatusName {
  return STATUS_NAMES.some((n) => n === name);
}

export function statusValue(name: StatusName): number {
  return StatusCode[name];
}

/** Symbolic name of a code, or null for values outside the table. */
export function statusName(code: number): StatusName | null {
  for (const name of STATUS_NAMES) {
    if (StatusCode[name] === code) return name;
  }
  return null;
}
