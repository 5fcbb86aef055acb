import fs from 'fs';
import path from 'path';
import { AlreadyExistsError, IoError, isNodeError } from '../errors';
import { log, LogLevel } from '../logger';
import { documentName, parseDocumentName, type VaultDocumentKey } from './fileNaming';

export interface StoredDocument<K extends VaultDocumentKey = VaultDocumentKey> {
  key: K;
  path: string;
}

export interface WriteOptions {
  overwrite?: boolean;
}

/**
 * File access for the period documents of one vault directory. Reads and
 * writes are synchronous; a write lands through a temporary sibling file so
 * a failure never leaves a half-written document behind.
 */
export class VaultStore {
  private readonly logMsg = '[VaultStore]';

  constructor(readonly root: string) {}

  pathFor(key: VaultDocumentKey): string {
    return path.join(this.root, documentName(key));
  }

  /** Documents of the given type, in directory order. Unrecognised file names are skipped. */
  list<T extends VaultDocumentKey['type']>(type: T): StoredDocument<Extract<VaultDocumentKey, { type: T }>>[] {
    let entries: string[];
    try {
      entries = fs.readdirSync(this.root);
    } catch (error) {
      throw new IoError('Cannot list vault directory', this.root, error);
    }

    const documents: StoredDocument<Extract<VaultDocumentKey, { type: T }>>[] = [];
    for (const entry of entries.sort()) {
      const key = parseDocumentName(entry);
      if (key && isOfType(key, type)) {
        documents.push({ key, path: path.join(this.root, entry) });
      }
    }
    log(LogLevel.DEBUG, `${this.logMsg} Found ${documents.length} ${type} document(s) in ${this.root}`);
    return documents;
  }

  exists(key: VaultDocumentKey): boolean {
    return fs.existsSync(this.pathFor(key));
  }

  read(filePath: string): string {
    try {
      return fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      throw new IoError('Cannot read document', filePath, error);
    }
  }

  /**
   * Writes a document atomically. Without `overwrite` an existing target
   * fails with AlreadyExistsError and is left untouched.
   */
  write(key: VaultDocumentKey, content: string, options: WriteOptions = {}): string {
    const target = this.pathFor(key);
    const tmp = path.join(this.root, `.${path.basename(target)}.${process.pid}.tmp`);

    try {
      fs.mkdirSync(this.root, { recursive: true });
      fs.writeFileSync(tmp, content, 'utf8');
    } catch (error) {
      this.discard(tmp);
      throw new IoError('Cannot write temporary file', tmp, error);
    }

    try {
      if (options.overwrite) {
        fs.renameSync(tmp, target);
      } else {
        // link() refuses an existing target, unlike rename().
        fs.linkSync(tmp, target);
        fs.unlinkSync(tmp);
      }
    } catch (error) {
      this.discard(tmp);
      if (isNodeError(error) && error.code === 'EEXIST') {
        throw new AlreadyExistsError(target);
      }
      throw new IoError('Cannot move document into place', target, error);
    }

    log(LogLevel.INFO, `${this.logMsg} Wrote ${target}${options.overwrite ? ' (overwrite)' : ''}`);
    return target;
  }

  remove(filePath: string): void {
    try {
      fs.unlinkSync(filePath);
    } catch (error) {
      throw new IoError('Cannot remove document', filePath, error);
    }
    log(LogLevel.INFO, `${this.logMsg} Removed ${filePath}`);
  }

  private discard(tmp: string): void {
    try {
      fs.rmSync(tmp, { force: true });
    } catch (error) {
      log(LogLevel.WARN, `${this.logMsg} Could not remove temporary file ${tmp}:`, error);
    }
  }
}

function isOfType<T extends VaultDocumentKey['type']>(
  key: VaultDocumentKey,
  type: T,
): key is Extract<VaultDocumentKey, { type: T }> {
  return key.type === type;
}
