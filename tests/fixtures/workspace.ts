import * as fs from 'fs'
import * as os from 'os'
import { join } from 'path'
import { fileURLToPath } from 'url'

/**
 * Temporary directory for tests that read or write files.
 */
export interface Workspace {
  dir: string
  path(name: string): string
  write(name: string, content: string): string
  read(name: string): string
  exists(name: string): boolean
  cleanup(): void
}

export function createWorkspace(): Workspace {
  const dir = fs.mkdtempSync(join(os.tmpdir(), 'record-scrubber-'))
  const path = (name: string) => join(dir, name)

  return {
    dir,
    path,
    write(name, content) {
      fs.writeFileSync(path(name), content, 'utf8')
      return path(name)
    },
    read: (name) => fs.readFileSync(path(name), 'utf8'),
    exists: (name) => fs.existsSync(path(name)),
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
  }
}

/**
 * Path to a fixture file shipped with the tests.
 */
export function fixturePath(name: string): string {
  return fileURLToPath(new URL(name, import.meta.url))
}
