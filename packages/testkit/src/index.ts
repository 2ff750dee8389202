/**
 * Test helpers shared by pipecloud packages
 */

export { createTempHome, removeDir, writeUserConfig, withTempHome } from "./fs.js";
export { runCli, parseJsonOutput, CLI_ENTRY, TSX_LOADER, type CliResult, type CliExecOptions } from "./cli.js";
export { FakeTrackingService, type RecordedRequest } from "./tracking-service.js";
