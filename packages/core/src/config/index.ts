export type { ProjectConfig } from './project-config.ts';
export {
  CONFIG_FILENAME,
  DEFAULT_PORT,
  loadProjectConfig,
  validateConfig,
  writeProjectConfig,
} from './project-config.ts';
