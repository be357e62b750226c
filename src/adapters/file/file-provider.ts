import * as fs from 'node:fs/promises'

/**
 * Read access to price database files.
 * Implement this interface for other environments or storage.
 */
export interface FileProvider {
  /**
   * Read file contents as string
   * @returns File contents, or empty string if file doesn't exist
   */
  read(path: string): Promise<string>

  /**
   * Get file metadata, or null if the file doesn't exist
   */
  stat(path: string): Promise<{ lastModified: Date } | null>
}

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT'
}

export class NodeFileProvider implements FileProvider {
  async read(path: string): Promise<string> {
    try {
      return await fs.readFile(path, 'utf-8')
    } catch (e) {
      if (isMissingFile(e)) {
        return ''
      }
      throw e
    }
  }

  async stat(path: string): Promise<{ lastModified: Date } | null> {
    try {
      const stats = await fs.stat(path)
      return { lastModified: stats.mtime }
    } catch (e) {
      if (isMissingFile(e)) {
        return null
      }
      throw e
    }
  }
}

/**
 * In-memory file provider (useful for testing)
 */
export class InMemoryFileProvider implements FileProvider {
  private files = new Map<string, { content: string; lastModified: Date }>()
  private clock = 0

  async read(path: string): Promise<string> {
    return this.files.get(path)?.content ?? ''
  }

  async stat(path: string): Promise<{ lastModified: Date } | null> {
    const file = this.files.get(path)
    return file ? { lastModified: file.lastModified } : null
  }

  /**
   * Store `content` at `path`. Each write gets a later modification time
   * than the previous one, even within the same millisecond.
   */
  put(path: string, content: string): void {
    this.clock = Math.max(Date.now(), this.clock + 1)
    this.files.set(path, { content, lastModified: new Date(this.clock) })
  }

  clear(): void {
    this.files.clear()
  }
}
