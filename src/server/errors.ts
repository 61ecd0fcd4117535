/**
 * Raised while building a channel from its configuration. A cover whose
 * configuration fails is skipped; nothing else is affected.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * A command the controller refused to transmit. Returned to the caller
 * rather than thrown, the channel state is left as it was.
 */
export class InvalidCommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidCommandError";
  }
}

export type CoverFaultKind = "device-fault" | "unhandled-status";

export interface CoverFault {
  kind: CoverFaultKind;
  serialNumber: string;
  channel: number;
  status: string;
}

export function describeFault(fault: CoverFault): string {
  const label =
    fault.kind === "device-fault" ? "error response" : "unhandled response";
  return `Transmitter: '${fault.serialNumber}' ch: '${fault.channel}' ${label}: '${fault.status}'.`;
}
