// Shared build infrastructure
//
// Cross-cutting utilities used by every pipeline stage.

// Diagnostics
export {
  buildDiagnostic,
  formatDiagnostic,
  sortDiagnostics,
  type BuildDiagnosticInput,
  type Diagnostic,
  type DiagnosticSeverity,
  type DiagnosticStage,
} from "./diagnostics.js";

// Values carried with their diagnostics
export {
  type Diagnosed,
  isStub,
  stubCause,
  withStub,
  pure,
  withDiags,
  collect,
  DiagnosticAccumulator,
} from "./diagnosed.js";

// Debug channels
export {
  debug,
  refreshDebugChannels,
  formatMessage,
  DEBUG_ENV,
  DEBUG_FORMAT_ENV,
  type Debug,
  type DebugChannel,
  type DebugData,
  type DebugFormat,
} from "./debug.js";
