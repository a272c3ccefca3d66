export type { ArtifactMaterializer } from './artifact-materializer.js'
export {
  ReferenceArtifactMaterializer,
  createReferenceMaterializer,
  inferFormat,
  inferKind,
} from './artifact-materializer.js'
