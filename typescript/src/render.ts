import { Scalar, TypeTag } from "./types";

/**
 * Options for textual rendering of a value sequence.
 */
export interface RenderOptions {
  /** Text placed between elements. Default: ", " */
  separator?: string;
}

export const DEFAULT_SEPARATOR = ", ";

/**
 * Shortest decimal that reads back as the same single-precision float,
 * so a float holding 0.1 prints as "0.1" rather than its double expansion.
 */
function formatFloat32(value: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }
  for (let precision = 1; precision <= 9; precision++) {
    const candidate = Number(value.toPrecision(precision));
    if (Math.fround(candidate) === value) {
      return String(candidate);
    }
  }
  return String(value);
}

/**
 * Canonical printed form of one primitive: `true`/`false` for booleans,
 * decimal for integers and floating point.
 */
export function formatScalar(scalar: Scalar): string {
  switch (scalar.tag) {
    case TypeTag.Float:
      return formatFloat32(scalar.value);
    default:
      return String(scalar.value);
  }
}

/**
 * Joins the printed forms of a sequence of primitives.
 */
export function renderScalars(scalars: Iterable<Scalar>, options: RenderOptions = {}): string {
  const separator = options.separator ?? DEFAULT_SEPARATOR;
  const parts: string[] = [];
  for (const scalar of scalars) {
    parts.push(formatScalar(scalar));
  }
  return parts.join(separator);
}
