/**
 * Output path derivation for extracted ASN.1 files.
 */

export const DEFAULT_OUTPUT_EXTENSION = '.asn';

/**
 * Replace everything from the final `.` of the file name with the
 * extension, or append the extension when the file name has no `.`.
 * Dots in directory names are not extensions.
 *
 * @example
 * deriveOutputPath('spec.doc.txt')   // => 'spec.doc.asn'
 * deriveOutputPath('specNoDot')      // => 'specNoDot.asn'
 * deriveOutputPath('../specs/raw')   // => '../specs/raw.asn'
 */
export function deriveOutputPath(
  inputPath: string,
  extension: string = DEFAULT_OUTPUT_EXTENSION
): string {
  const nameStart = Math.max(inputPath.lastIndexOf('/'), inputPath.lastIndexOf('\\')) + 1;
  const dot = inputPath.lastIndexOf('.');
  if (dot < nameStart) {
    return inputPath + extension;
  }
  return inputPath.slice(0, dot) + extension;
}
