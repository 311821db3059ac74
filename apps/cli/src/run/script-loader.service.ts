import { Injectable } from '@nestjs/common';
import { readFile, stat } from 'fs/promises';
import { types } from 'util';
import { errorMessage, MissingOrUnreadableScriptError } from '../common/errors';

@Injectable()
export class ScriptLoaderService {
  /** Reads the script once; the returned buffer is shared by every job of the run. */
  async load(scriptPath: string): Promise<Buffer> {
    try {
      const info = await stat(scriptPath);
      if (!info.isFile()) throw new MissingOrUnreadableScriptError(scriptPath, 'is not a regular file');
    } catch (err) {
      if (err instanceof MissingOrUnreadableScriptError) throw err;
      const reason = isErrnoException(err) && err.code === 'ENOENT' ? 'not found' : `cannot be accessed: ${errorMessage(err)}`;
      throw new MissingOrUnreadableScriptError(scriptPath, reason);
    }

    try {
      return await readFile(scriptPath);
    } catch (err) {
      throw new MissingOrUnreadableScriptError(scriptPath, `is not readable: ${errorMessage(err)}`);
    }
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return types.isNativeError(err) && 'code' in err;
}
