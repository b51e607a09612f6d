export {
  KEY_SEPARATOR,
  normalizeLabel,
  isAutomationKey,
  toAutomationKey,
  deriveAutomationKey,
  automationKeyOf,
} from './automation-key.js';
