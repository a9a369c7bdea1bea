export { extractRowsFromSettings, getNested, DEFAULT_SETTINGS_PATH } from "./settings.js";
