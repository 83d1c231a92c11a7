import { HeaderError } from "../errors.js";
import { DEFAULT_DIALECT, type Dialect } from "../types/dialect.js";
import type { MachineType } from "../types/machine.js";

export const EMPTY_FILE_HEADER = "File is empty";

/**
 * Map the first line of a table to the machine type it declares.
 * `undefined` means the file had no lines at all.
 */
export function resolveHeader(
  line: string | undefined,
  dialect: Dialect = DEFAULT_DIALECT,
): MachineType {
  if (line === undefined) throw new HeaderError(EMPTY_FILE_HEADER);
  if (line === dialect.headers.infinite) return "infinite";
  if (line === dialect.headers.sipser) return "sipser";
  throw new HeaderError(line);
}
