export type ScoringErrorKind = 'InvalidHandShape' | 'NoYakuFound' | 'AmbiguousConfiguration';

export type ScoringError = {
  kind: ScoringErrorKind;
  message: string;
};

export type Result<T> = { ok: true; value: T } | { ok: false; error: ScoringError };

export function fail<T>(kind: ScoringErrorKind, message: string): Result<T> {
  return { ok: false, error: { kind, message } };
}

export function succeed<T>(value: T): Result<T> {
  return { ok: true, value };
}
