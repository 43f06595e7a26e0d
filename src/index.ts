// linemenu — Public API Surface
export { createCLI } from './cli/index.js';
export { ExtensionRegistry } from './extensions/registry.js';
export { DirectorySource, MemorySource } from './extensions/source.js';
export { validateExtension, formatValidationError } from './extensions/validator.js';
export { findUnboundPlaceholders } from './extensions/lint.js';
export { MenuNavigator } from './navigator/navigator.js';
export { IOPromptExecutor } from './io/executor.js';
export { ShellCommandRunner } from './io/runner.js';
export { ReadlineIO } from './io/line-io.js';
export { Bindings, substitute } from './io/substitute.js';
export { SettingsLoader } from './config/loader.js';
export { ActivityLog } from './logging/activity-log.js';
export { CommandExecutionError, SettingsError } from './errors.js';

// Types
export type {
    Extension, Program, Menu, MenuItem, MenuAction, IOBlock, Prompt, Input, InputType,
    ValidationError, ValidationResult,
} from './extensions/types.js';
export type { LookupResult, LoadReport, LoadFailure } from './extensions/registry.js';
export type { DocumentSource, SourceEntry } from './extensions/source.js';
export type { NavigationState } from './navigator/state.js';
export type { LineIO } from './io/line-io.js';
export type { CommandRunner } from './io/runner.js';
export type { IOOutcome } from './io/executor.js';
export type { SubstitutionResult } from './io/substitute.js';
export type { AppSettings } from './config/schema.js';
