/** Malformed input. Fatal for the whole run; no partial output is produced. */
export class ValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid assignment input: ${issues.join('; ')}`);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/** Unreadable or invalid configuration file */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly file: string,
  ) {
    super(`${message} (${file})`);
    this.name = 'ConfigError';
  }
}

/** A run finished with a ticket outside the ASSIGNED state */
export class AllocationError extends Error {
  constructor(readonly ticketId: string, state: string) {
    super(`Ticket ${ticketId} ended the run in state ${state}`);
    this.name = 'AllocationError';
  }
}
