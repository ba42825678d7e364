export { FsConfigStore } from './fs_config_store';
