export type { FormatConfig } from './loader.js';
export {
  DEFAULT_FORMAT_CONFIG,
  FormatConfigError,
  loadFormatConfig,
  toRenderOptions,
  applyFormatConfig,
} from './loader.js';
