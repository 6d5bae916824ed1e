export type TransferErrorKind =
  | 'InputValidation'
  | 'ResumeConflict'
  | 'IOFailure'
  | 'TransportFailure'
  | 'ProtocolViolation'
  | 'DestinationConflict';

export class TransferError extends Error {
  public readonly kind: TransferErrorKind;

  constructor(kind: TransferErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransferError';
    this.kind = kind;
  }

  /**
   * Wrap an arbitrary thrown value, keeping an existing TransferError as is.
   */
  public static from(kind: TransferErrorKind, error: unknown): TransferError {
    if (error instanceof TransferError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new TransferError(kind, message, { cause: error });
  }
}
