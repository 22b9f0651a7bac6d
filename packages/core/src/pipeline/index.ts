export {
  runPipeline,
  processFinding,
  summarizeValidation,
  type PipelineOptions,
  type PipelineResult,
} from './pipeline.js';
