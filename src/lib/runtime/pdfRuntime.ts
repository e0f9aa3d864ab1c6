// pdfjs-dist@5 needs process.getBuiltinModule, first shipped in these release lines.
const MINIMUM_MINOR_BY_MAJOR = new Map<number, number>([
  [20, 16],
  [22, 3],
]);
const FIRST_UNRESTRICTED_MAJOR = 23;

const parseNodeVersion = (version: string): { major: number; minor: number } | null => {
  const [major, minor] = version
    .replace(/^v/, "")
    .split(".")
    .map((part) => Number.parseInt(part, 10));

  if (!Number.isFinite(major) || !Number.isFinite(minor)) {
    return null;
  }

  return { major, minor };
};

export const isPdfRuntimeCompatible = (version = process.versions.node): boolean => {
  const parsed = parseNodeVersion(version);
  if (!parsed) {
    return false;
  }

  if (parsed.major >= FIRST_UNRESTRICTED_MAJOR) {
    return true;
  }

  const minimumMinor = MINIMUM_MINOR_BY_MAJOR.get(parsed.major);
  return minimumMinor !== undefined && parsed.minor >= minimumMinor;
};

export const getPdfRuntimeRequirementMessage = (version = process.versions.node): string =>
  `Running on Node ${version}. Clause extraction uses pdfjs-dist@5, which requires Node >=20.16.0 or >=22.3.0.`;

export const assertPdfRuntimeCompatible = (version = process.versions.node): void => {
  if (!isPdfRuntimeCompatible(version)) {
    throw new Error(getPdfRuntimeRequirementMessage(version));
  }
};
