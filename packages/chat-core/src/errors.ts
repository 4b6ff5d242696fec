export type DecodeErrorKind = "MalformedFrame" | "MalformedTag";

/** A single line could not be decoded. Scoped to that line; the reader keeps going. */
export class DecodeError extends Error {
  readonly kind: DecodeErrorKind;
  readonly input: string;

  constructor(kind: DecodeErrorKind, input: string, message: string) {
    super(message);
    this.name = "DecodeError";
    this.kind = kind;
    this.input = input;
  }
}

export type RegistrationErrorKind = "InvalidRegistration" | "AlreadyRegistered";

export class RegistrationError extends Error {
  readonly kind: RegistrationErrorKind;

  constructor(kind: RegistrationErrorKind, message: string) {
    super(message);
    this.name = "RegistrationError";
    this.kind = kind;
  }
}

export type WriteErrorKind = "Closed" | "Io" | "EmptyChannelName" | "MessageTooLong" | "InvalidArgument";

export class WriteError extends Error {
  readonly kind: WriteErrorKind;

  constructor(kind: WriteErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WriteError";
    this.kind = kind;
  }
}

export class ReadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ReadError";
  }
}
