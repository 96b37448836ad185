/**
 * Tipos de fallo recuperables al acceder al sistema de archivos
 */
export type FsFailureKind =
  | "FilesystemUnreadable"
  | "FileUnopenable"
  | "NotFound";

export interface FsFailure {
  kind: FsFailureKind;
  path: string;
  message: string;
}

/**
 * Resultado explícito de una operación de sistema de archivos.
 * Los errores se devuelven como valor, nunca se lanzan.
 */
export type FsResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: FsFailure };

export function success<T>(value: T): FsResult<T> {
  return { ok: true, value };
}

export function failure<T>(
  kind: FsFailureKind,
  path: string,
  cause: unknown
): FsResult<T> {
  return {
    ok: false,
    error: {
      kind,
      path,
      message: describeCause(cause),
    },
  };
}

function describeCause(cause: unknown): string {
  return typeof cause === "object" &&
    cause !== null &&
    "message" in cause &&
    typeof cause.message === "string"
    ? cause.message
    : String(cause);
}
