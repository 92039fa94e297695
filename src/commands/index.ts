/**
 * CLI Command Handlers
 */

export { clearCommand } from "./clear";
export { copyCommand } from "./copy";
export { exportCommand } from "./export";
export { historyCommand } from "./history";
export { importCommand } from "./import";
export { logsCommand } from "./logs";
export { pasteCommand } from "./paste";
export { pinCommand } from "./pin";
export { pinnedCommand } from "./pinned";
export { quickCommand } from "./quick";
export { rmCommand } from "./rm";
export { selectCommand } from "./select";
export { settingsCommand, formatSettingValue, parseShortcut } from "./settings";
export { showCommand } from "./show";
export { snippetCommand } from "./snippet";
export { unpinCommand } from "./unpin";
export { watchCommand, waitForShutdownSignal } from "./watch";
