import { access, appendFile, mkdir, readFile } from 'node:fs/promises'
import path from 'node:path'

export interface FileSystem {
  readText(path: string): Promise<string>;
  readBytes(path: string): Promise<Uint8Array>;
  readJSON<T>(path: string): Promise<T>;
  appendText(path: string, content: string): Promise<void>;
  exists(path: string): Promise<boolean>;
  mkdir(path: string): Promise<void>;
}

export class NodeFileSystem implements FileSystem {
  async readText(filePath: string): Promise<string> {
    return readFile(filePath, 'utf8');
  }

  async readBytes(filePath: string): Promise<Uint8Array> {
    return new Uint8Array(await readFile(filePath));
  }

  async readJSON<T>(filePath: string): Promise<T> {
    return JSON.parse(await this.readText(filePath)) as T;
  }

  async appendText(filePath: string, content: string): Promise<void> {
    await this.mkdir(path.dirname(filePath));
    await appendFile(filePath, content, 'utf8');
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async mkdir(dirPath: string): Promise<void> {
    await mkdir(dirPath, { recursive: true });
  }
}

export class MockFileSystem implements FileSystem {
  private files = new Map<string, string | Uint8Array>();
  private unreadable = new Set<string>();

  async readText(filePath: string): Promise<string> {
    const content = this.read(filePath);
    return typeof content === 'string' ? content : new TextDecoder().decode(content);
  }

  async readBytes(filePath: string): Promise<Uint8Array> {
    const content = this.read(filePath);
    return typeof content === 'string' ? new TextEncoder().encode(content) : content;
  }

  async readJSON<T>(filePath: string): Promise<T> {
    return JSON.parse(await this.readText(filePath)) as T;
  }

  async appendText(filePath: string, content: string): Promise<void> {
    const existing = this.files.has(filePath) ? await this.readText(filePath) : '';
    this.files.set(filePath, existing + content);
  }

  async exists(filePath: string): Promise<boolean> {
    return this.files.has(filePath);
  }

  async mkdir(_path: string): Promise<void> {}

  setFile(filePath: string, content: string | Uint8Array): void {
    this.files.set(filePath, content);
  }

  /** The file exists but every read fails. */
  setUnreadable(filePath: string): void {
    this.files.set(filePath, '');
    this.unreadable.add(filePath);
  }

  getFiles(): Map<string, string | Uint8Array> {
    return new Map(this.files);
  }

  private read(filePath: string): string | Uint8Array {
    if (this.unreadable.has(filePath)) throw new Error(`EACCES: ${filePath}`);
    const content = this.files.get(filePath);
    if (content === undefined) throw new Error(`ENOENT: ${filePath}`);
    return content;
  }
}
