export { Settings, resolveRuntimeSettings, type RuntimeSettingsResult } from './settings.js';
export {
  loadToolServerConfigs,
  resolveServerEntry,
  expandSettings,
  type ToolServerConfig,
} from './tool-servers.js';
export {
  RuntimeSettingsSchema,
  ToolServersFileSchema,
  type RuntimeSettings,
  type ToolServerEntry,
  type ToolServersFile,
} from './schema.js';
