export class ChatgateError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ChatgateError";
    this.code = code;
  }
}

/** Infrastructure that may succeed on retry: directory, store or notifier I/O. */
export class TransientFailureError extends ChatgateError {
  constructor(message: string, options?: { cause?: unknown; code?: string }) {
    super(options?.code ?? "TRANSIENT_FAILURE", message, options);
    this.name = "TransientFailureError";
  }
}

export class TimeoutError extends TransientFailureError {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`, { code: "TIMEOUT" });
    this.name = "TimeoutError";
  }
}

export class DirectoryConflictError extends TransientFailureError {
  constructor(field: "phone" | "client_code" | "id", matches: number) {
    super(`directory returned ${matches} active users for one ${field}`, { code: "DIRECTORY_CONFLICT" });
    this.name = "DirectoryConflictError";
  }
}

export class SessionStoreError extends TransientFailureError {
  constructor(operation: string, cause: unknown) {
    super(`session store ${operation} failed: ${String(cause)}`, { cause, code: "SESSION_STORE" });
    this.name = "SessionStoreError";
  }
}

export class CorruptSessionError extends ChatgateError {
  constructor(readonly senderAddress: string, detail: string) {
    super("CORRUPT_SESSION", `corrupt session for ${senderAddress}: ${detail}`);
    this.name = "CorruptSessionError";
  }
}

export class UnregisteredCapabilityError extends ChatgateError {
  constructor(readonly capability: string) {
    super("UNREGISTERED_CAPABILITY", `no handler registered for '${capability}'`);
    this.name = "UnregisteredCapabilityError";
  }
}
