export {
  PLATFORM_CAPABILITIES,
  detectPlatform,
  getCapabilities,
  type PlatformCapabilities,
} from './capabilities.js';
export {
  CONVENTION_TABLE,
  NAME_TOKEN,
  PathTemplateKind,
  getTemplates,
  type PathTemplate,
} from './conventions.js';
