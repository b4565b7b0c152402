import { ParseError } from "./errors";

export type Ok<T> = { type: "ok"; value: T };
export type Err<E> = { type: "err"; error: E };
export type Result<T, E = ParseError> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ type: "ok", value });
export const err = <E>(error: E): Err<E> => ({ type: "err", error });

export const isOk = <T, E>(result: Result<T, E>): result is Ok<T> => result.type === "ok";
export const isErr = <T, E>(result: Result<T, E>): result is Err<E> => result.type === "err";

export const map = <A, B, E>(result: Result<A, E>, f: (value: A) => B): Result<B, E> =>
  isOk(result) ? ok(f(result.value)) : result;

export const andThen = <A, B, E>(
  result: Result<A, E>,
  f: (value: A) => Result<B, E>
): Result<B, E> => (isOk(result) ? f(result.value) : result);
