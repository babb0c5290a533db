export {
  loadContent,
  identifierFromPath,
  DEFAULT_CONTENT_EXTENSIONS,
  type AssetFile,
  type ContentSource,
  type LoadContentOptions,
  type LoadedContent,
} from "./loader.js";
