/**
 * Application-level result carried inside a successful remote call:
 * the remote side either refused (`left`, with a reason) or answered.
 */
export type Either<L, R> =
  | { readonly kind: "left"; readonly value: L }
  | { readonly kind: "right"; readonly value: R };

export function left<L>(value: L): { readonly kind: "left"; readonly value: L } {
  return { kind: "left", value };
}

export function right<R>(value: R): { readonly kind: "right"; readonly value: R } {
  return { kind: "right", value };
}

export function isLeft<L, R>(e: Either<L, R>): e is { readonly kind: "left"; readonly value: L } {
  return e.kind === "left";
}

export function isRight<L, R>(e: Either<L, R>): e is { readonly kind: "right"; readonly value: R } {
  return e.kind === "right";
}

/** Compile-time exhaustiveness check for closed unions. */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
