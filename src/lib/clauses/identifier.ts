export const HEADING_NUMBER_REGEX = /^(\d+(?:\.\d+)*)(?:\s+(.*\S))?$/;

const SEGMENT_REGEX = /^\d+$/;

export const matchHeadingNumber = (
  text: string,
): { identifier: string; remainder: string } | null => {
  const match = HEADING_NUMBER_REGEX.exec(text);
  if (!match) {
    return null;
  }

  return { identifier: match[1], remainder: (match[2] ?? "").trim() };
};

export const identifierSegments = (identifier: string): number[] =>
  identifier.split(".").map((segment) => Number.parseInt(segment, 10));

export const isTopLevelIdentifier = (identifier: string): boolean =>
  !identifier.includes(".");

export const isWellFormedIdentifier = (identifier: string): boolean =>
  identifier.split(".").every((segment) => SEGMENT_REGEX.test(segment));

export const parentIdentifier = (identifier: string): string | null => {
  const cut = identifier.lastIndexOf(".");
  return cut < 0 ? null : identifier.slice(0, cut);
};

export const compareIdentifiers = (a: string, b: string): number => {
  const left = identifierSegments(a);
  const right = identifierSegments(b);
  const shared = Math.min(left.length, right.length);

  for (let index = 0; index < shared; index += 1) {
    if (left[index] !== right[index]) {
      return left[index] - right[index];
    }
  }

  return left.length - right.length;
};
