export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// ============================================
// Error kinds surfaced by the game core
// ============================================

export type GameErrorKind = 'resource_unavailable' | 'precondition_failed' | 'not_found';

export interface GameError {
  kind: GameErrorKind;
  message: string;
}

export function gameError(kind: GameErrorKind, message: string): GameError {
  return { kind, message };
}
