/**
 * Resultado tipado para operaciones que pueden fallar.
 *
 * Encaje en el sistema:
 * - Los stores y el servicio del maratón devuelven `Result` en vez de lanzar, para que un
 *   fallo de disco o un archivo inválido se traduzca en una respuesta y no tumbe el proceso.
 * - `Ok(null)` significa "no hay dato"; `Err(error)` significa "falló la operación".
 *
 * Contrato:
 * - `unwrap()` solo existe en `Ok`. Hay que chequear `isOk()`/`isErr()` antes, y el
 *   compilador lo exige.
 *
 * Ejemplo:
 * ```ts
 * const res = await store.load();
 * if (res.isErr()) return ErrResult(res.error);
 * const value = res.unwrap();
 * ```
 */
export type Result<T, E = Error> = Ok<T, E> | Err<T, E>;

export class Ok<T, E> {
  readonly ok = true;
  readonly err = false;

  constructor(public readonly value: T) {}

  isOk(): this is Ok<T, E> {
    return true;
  }

  isErr(): this is Err<T, E> {
    return false;
  }

  unwrap(): T {
    return this.value;
  }
}

export class Err<T, E> {
  readonly ok = false;
  readonly err = true;

  constructor(public readonly error: E) {}

  isOk(): this is Ok<T, E> {
    return false;
  }

  isErr(): this is Err<T, E> {
    return true;
  }
}

/** Crea un resultado exitoso. */
export const OkResult = <T, E = Error>(value: T): Result<T, E> => new Ok(value);

/** Crea un resultado fallido. */
export const ErrResult = <T, E = Error>(error: E): Result<T, E> => new Err(error);

/** Normaliza cualquier valor capturado en un `Error`. */
export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
