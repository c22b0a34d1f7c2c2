export {
  ClientRegistry,
  SERVICES,
  missingKeyWarning,
  type ServiceName,
  type ToolReporter,
  type ClientFactory,
  type ClientRegistryOptions,
} from './client-registry.js';
