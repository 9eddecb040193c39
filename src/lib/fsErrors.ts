export function errnoCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }

  return typeof error.code === "string" ? error.code : undefined;
}

export function isEnoent(error: unknown): error is NodeJS.ErrnoException {
  return errnoCode(error) === "ENOENT";
}
