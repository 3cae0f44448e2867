export {
  type SinkProvider,
  type SinkConfig,
  type ObjectStoreSinkConfig,
  type HttpSinkConfig,
  resolveSinkConfig,
} from './config.js';
