export {
  createFileSettings,
  defaultSettingsDir,
  type FileSettings,
  type FileSettingsOptions,
  type SettingsData,
} from "./settings.js";
export { bundledResources, fileResource } from "./resources.js";
export {
  defineConfig,
  loadConfig,
  DEFAULT_SOURCE_ORDER,
  SOURCE_NAMES,
  type SourceName,
  type UrlbarConfig,
} from "./config.js";
export {
  printCompletion,
  printDomainList,
  printError,
  printSuccess,
  printToggles,
} from "./logger.js";
export {
  createDomainCompletion,
  type DomainCompletionOptions,
  type DomainCompletionSetup,
} from "./autocomplete.js";
