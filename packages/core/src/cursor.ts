import { BadParamInput } from "@clean-articles/errors";

/**
 * Page cursors are the base64 form of the last seen `createdAt` instant.
 */
export function encodeCursor(createdAt: Date): string {
  return Buffer.from(createdAt.toISOString(), "utf-8").toString("base64");
}

/**
 * An empty cursor starts from the beginning. Anything that does not decode to
 * a valid instant raises `BadParamInput`.
 */
export function decodeCursor(cursor: string): Date {
  if (cursor === "") {
    return new Date(0);
  }

  const decoded = new Date(Buffer.from(cursor, "base64").toString("utf-8"));
  if (Number.isNaN(decoded.getTime())) {
    throw BadParamInput;
  }
  return decoded;
}
