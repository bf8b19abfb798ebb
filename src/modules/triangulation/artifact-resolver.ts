/**
 * Artifact resolvers load the content behind an artifact reference.
 */

import { readFile } from 'fs/promises'
import { isAbsolute, resolve } from 'path'

export interface ArtifactResolver {
  resolve(artifactRef: string): Promise<string>
}

/** Reads artifact references as file paths relative to a base directory */
export class FileArtifactResolver implements ArtifactResolver {
  private readonly _baseDir: string

  constructor(baseDir: string = process.cwd()) {
    this._baseDir = baseDir
  }

  async resolve(artifactRef: string): Promise<string> {
    const path = isAbsolute(artifactRef) ? artifactRef : resolve(this._baseDir, artifactRef)
    return readFile(path, 'utf-8')
  }
}

/** Resolves references from an in-memory map; used by tests and embedders */
export class InMemoryArtifactResolver implements ArtifactResolver {
  private readonly _artifacts = new Map<string, string>()

  constructor(artifacts: Record<string, string> = {}) {
    for (const [ref, content] of Object.entries(artifacts)) {
      this._artifacts.set(ref, content)
    }
  }

  set(artifactRef: string, content: string): void {
    this._artifacts.set(artifactRef, content)
  }

  async resolve(artifactRef: string): Promise<string> {
    const content = this._artifacts.get(artifactRef)
    if (content === undefined) {
      throw new Error(`Unknown artifact: ${artifactRef}`)
    }
    return content
  }
}
