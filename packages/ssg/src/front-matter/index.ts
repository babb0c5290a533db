export {
  parseFrontMatter,
  FRONT_MATTER_MARKER,
  type FrontMatterData,
  type ParsedSource,
} from "./parse.js";
export { serializeFrontMatter } from "./serialize.js";
