//NOTE(self): Error taxonomy shared by every entry script
//NOTE(self): Prerequisite and validation errors are raised before any mutating call

export type PlanErrorCode = 'PREREQUISITE' | 'VALIDATION' | 'TRACKER';

export class PlanTrackerError extends Error {
  constructor(message: string, public readonly code: PlanErrorCode) {
    super(message);
    this.name = 'PlanTrackerError';
  }
}

//NOTE(self): Missing token, unreachable repo, failed authentication
export class PrerequisiteError extends PlanTrackerError {
  constructor(message: string) {
    super(message, 'PREREQUISITE');
    this.name = 'PrerequisiteError';
  }
}

//NOTE(self): Unknown enum values, empty required strings, missing body fields
export class ValidationError extends PlanTrackerError {
  constructor(message: string) {
    super(message, 'VALIDATION');
    this.name = 'ValidationError';
  }
}

//NOTE(self): The tracker or downstream repository rejected a call
export class TrackerError extends PlanTrackerError {
  constructor(message: string) {
    super(message, 'TRACKER');
    this.name = 'TrackerError';
  }
}

export function isPlanTrackerError(error: unknown): error is PlanTrackerError {
  return error instanceof PlanTrackerError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
