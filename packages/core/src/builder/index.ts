export {
  createPresentationBuilder,
  type BuildResult,
  type PresentationBuilder,
  type PresentationBuilderOptions,
} from "./builder.js";
export {
  parseDirective,
  parseMetadata,
  type Directive,
  type MetadataParseResult,
  type PresentationMetadata,
} from "./metadata.js";
