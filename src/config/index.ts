export { FileConfigStore, MemoryConfigStore, orderSettings, type ConfigStore } from './store.js';
export { mapSettingKeys, resolveSettings } from './resolver.js';
