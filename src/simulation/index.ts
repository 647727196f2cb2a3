export {
  SimulationRunner,
  type SimulationConfig,
  type SimulationReport,
  type ArchitectureRun,
} from './runner.js';
