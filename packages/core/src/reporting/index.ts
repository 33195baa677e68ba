export {
  describeError,
  escapeHtml,
  formatCount,
  formatElapsed,
  serialiseError,
  type SerialisedError,
} from './formatting.js';
