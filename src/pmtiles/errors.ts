export class DirectoryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DirectoryError';
  }
}

export type DecodeFailureReason = 'truncated' | 'invalid-entry' | 'overflow' | 'unsorted' | 'overlapping' | 'trailing-data';

export class DirectoryDecodeError extends DirectoryError {
  constructor(
    public readonly reason: DecodeFailureReason,
    message: string,
  ) {
    super(message);
    this.name = 'DirectoryDecodeError';
  }
}
