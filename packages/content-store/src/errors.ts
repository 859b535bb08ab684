export type ContentStoreErrorCode = "NotFound" | "UnsupportedAlgorithm" | "InvalidConfig";

export type ContentStoreError = {
  readonly name: "ContentStoreError";
  readonly code: ContentStoreErrorCode;
  message: string;
};

export function createContentStoreError(
  code: ContentStoreErrorCode,
  message?: string
): ContentStoreError {
  return { name: "ContentStoreError", code, message: message ?? code };
}

export function isContentStoreError(x: unknown): x is ContentStoreError {
  return (
    typeof x === "object" &&
    x !== null &&
    "name" in x &&
    x.name === "ContentStoreError" &&
    "code" in x
  );
}
