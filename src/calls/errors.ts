export type RelayErrorCode =
  | 'handshake_failure'
  | 'duplicate_call_identifier'
  | 'transport_send_failure'
  | 'transport_closed'
  | 'codec_contract_violation';

export class RelayError extends Error {
  public readonly code: RelayErrorCode;

  constructor(code: RelayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class HandshakeFailureError extends RelayError {
  public readonly timedOut: boolean;

  constructor(message: string, options: { timedOut?: boolean; cause?: unknown } = {}) {
    super('handshake_failure', message, { cause: options.cause });
    this.timedOut = options.timedOut ?? false;
  }
}

export class DuplicateCallIdentifierError extends RelayError {
  public readonly callId: string;

  constructor(callId: string) {
    super('duplicate_call_identifier', `a relay session already exists for call ${callId}`);
    this.callId = callId;
  }
}

export class TransportSendFailureError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transport_send_failure', message, options);
  }
}

export class TransportClosedError extends RelayError {
  constructor(message = 'transport is closed') {
    super('transport_closed', message);
  }
}

/** Malformed input reached the codec: a programming error, never a per-frame fault. */
export class CodecContractViolation extends RelayError {
  constructor(message: string) {
    super('codec_contract_violation', message);
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return 'unknown_error';
}
