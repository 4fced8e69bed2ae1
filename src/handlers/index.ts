export type { Services } from "./context.js";
export { handleAppMention } from "./appMention.js";
export { handleMessageEvent } from "./message.js";
export { handleFileShared } from "./fileShared.js";
export { handleFileDeleted } from "./fileDeleted.js";
export { handleChannelDeleted } from "./channelDeleted.js";
export { handleAppUninstalled } from "./appUninstalled.js";
export { handleAppHomeOpened } from "./appHomeOpened.js";
export { handleSettingsAction, settingsPatchFromAction, SETTINGS_ACTION_IDS } from "./settingsActions.js";
