/**
 * Utility exports
 */

// Path/filename utilities
export { filenameToTitle } from "./filename-to-title";
export { extractTitle } from "./extract-title";

// Filesystem utilities
export { fileExists, isNonEmptyFile, ensureDirectory, removeDirectory } from "./fs";

// Hashing and staleness
export { digest, hashFile, configFingerprint, settingsFingerprint } from "./fingerprint";
export { checkStaleness, needsRegeneration } from "./staleness";

// Layout values
export { parseDimension, resolveDimension } from "./dimension";
export { parseMargins, parseMarginValue, marginToCm, formatCm } from "./margins";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  getDefaultDatabasePath,
  loadDefaultConfig,
} from "./load-config";
export { createSettings } from "./create-settings";
export type { SettingsOverrides } from "./create-settings";

// External tools
export { runProcess } from "./run-process";
export { checkDependencies } from "./check-dependencies";
export type { DependencyStatus } from "./check-dependencies";

// Classes
export { Logger } from "./logger";
export { Tracker } from "./tracker";
