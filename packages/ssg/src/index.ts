/**
 * @sssg/ssg - static site generation for a Markdown blog
 *
 * Primary exports:
 * - build() - one full run from content directory to output directory
 * - loadConfigFile() / resolveConfig() - configuration
 * - parseFrontMatter(), loadContent(), buildSite(), renderSite(), emitSite() - the stages
 */

export { build, type BuildCollaborators, type BuildResult } from "./build.js";
export { run, parseCliArgs, USAGE, EXIT_OK, EXIT_BUILD_FAILED, EXIT_USAGE, type CliFlags, type CliIO } from "./cli.js";
export {
  loadConfigFile,
  resolveConfig,
  siteConfigSchema,
  ConfigError,
  CONFIG_FILE_NAME,
  DEFAULT_CONTENT_DIR,
  DEFAULT_OUT_DIR,
  type ConfigOverrides,
  type ResolvedSiteConfig,
  type SiteConfig,
} from "./config.js";
export {
  siteDiagnostics,
  siteDiagnostic,
  kindOf,
  type SiteDiagnostic,
  type SiteDiagnosticCode,
  type SiteErrorKind,
} from "./diagnostics.js";
export {
  SiteError,
  MalformedFrontMatterError,
  ContentReadError,
  ValidationError,
  RenderError,
  OutputWriteError,
  errorFromDiagnostics,
  isSiteError,
} from "./errors.js";
export * from "./front-matter/index.js";
export * from "./content/index.js";
export * from "./model/index.js";
export * from "./render/index.js";
export * from "./emit/index.js";
