export {
  scenarioSchema,
  parseScenario,
  loadScenario,
  runScenario,
  type Scenario,
  type ScenarioTick,
  type ScenarioTrace,
  type SlotReport,
  type TickReport,
} from './scenario.js';
export {
  formatWeight,
  formatWeightedMap,
  formatTickReport,
  formatVocabulary,
  formatTrace,
} from './output/formatter.js';
export { setupBank, handleError, type Setup } from './setup.js';
