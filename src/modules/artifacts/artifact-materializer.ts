/**
 * ArtifactMaterializer — turns one raw generation output into an artifact draft.
 *
 * Downloading and storing files is the materializer's business; the
 * orchestrator only persists whatever draft comes back. The reference
 * implementation keeps the output URL as the file reference and infers kind and
 * format from the file extension.
 */

import type { ArtifactKind, Generation } from '../../core/types.js'
import type { NewArtifact } from '../persistence/persistence-gateway.js'

export interface ArtifactMaterializer {
  materialize(output: string, generation: Generation): Promise<NewArtifact>
}

const KIND_BY_FORMAT: Record<string, ArtifactKind> = {
  png: 'image',
  jpg: 'image',
  jpeg: 'image',
  webp: 'image',
  gif: 'image',
  bmp: 'image',
  tiff: 'image',
  mp4: 'video',
  webm: 'video',
  mov: 'video',
  mp3: 'audio',
  wav: 'audio',
  ogg: 'audio',
  flac: 'audio',
}

/**
 * Extension of the last path segment, lower-cased, ignoring query and fragment.
 * Returns null when the reference has no recognisable extension.
 */
export function inferFormat(fileRef: string): string | null {
  const path = fileRef.split(/[?#]/, 1)[0] ?? ''
  const lastSegment = path.slice(path.lastIndexOf('/') + 1)
  const dot = lastSegment.lastIndexOf('.')
  if (dot <= 0 || dot === lastSegment.length - 1) return null
  return lastSegment.slice(dot + 1).toLowerCase()
}

/** Unknown formats are treated as images, the service's primary output */
export function inferKind(format: string | null): ArtifactKind {
  if (format === null) return 'image'
  return KIND_BY_FORMAT[format] ?? 'image'
}

export class ReferenceArtifactMaterializer implements ArtifactMaterializer {
  async materialize(output: string, generation: Generation): Promise<NewArtifact> {
    const format = inferFormat(output)
    return {
      generationId: generation.id,
      kind: inferKind(format),
      fileRef: output,
      width: null,
      height: null,
      format,
      fileSize: null,
      metadata: { sourceUrl: output, model: generation.model },
    }
  }
}

export function createReferenceMaterializer(): ArtifactMaterializer {
  return new ReferenceArtifactMaterializer()
}
