export function errnoCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const code = error.code;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

export function isEnoent(error: unknown): error is NodeJS.ErrnoException {
  return errnoCode(error) === "ENOENT";
}
