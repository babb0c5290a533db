export { emitSite, stagingPathFor, type EmitResult } from "./emitter.js";
export { copyFileScoped, writeFileScoped } from "./writer.js";
