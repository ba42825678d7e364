export { FsStateStore } from './fs_state_store';
