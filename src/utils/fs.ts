import { promises as fs, constants } from 'fs';
import type { PathLike } from 'fs';

const MISSING_CODES = ['ENOENT', 'ENOTDIR'];

// fs errors from another realm fail `instanceof Error`; read the code
// structurally, with the message as a last resort.
function isMissingPathError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  if ('code' in error && typeof error.code === 'string') {
    return MISSING_CODES.includes(error.code.toUpperCase());
  }
  if ('message' in error && typeof error.message === 'string') {
    const message = error.message;
    return MISSING_CODES.some((code) => message.includes(code));
  }
  return false;
}

export async function pathExists(targetPath: PathLike): Promise<boolean> {
  try {
    await fs.access(targetPath, constants.F_OK);
    return true;
  } catch (error) {
    if (isMissingPathError(error)) {
      return false;
    }
    throw error;
  }
}
