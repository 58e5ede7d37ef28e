export {
  type ProfileHeader,
  createProfileHeader,
  formatProfileLine,
  parseJsonLine,
  readProfileHeader,
} from "./jsonl.js";
export {
  type CreateWorkerProfilerSinkOptions,
  type ProfileLinePort,
  type ProfilerWorkerMessage,
  type SpawnProfileWriter,
  type WorkerProfilerSink,
  type WorkerProfilerSinkStats,
  createWorkerProfilerSink,
  spawnProfilerWorker,
} from "./workerSink.js";
export {
  DEFAULT_PROFILE_OUTPUT,
  type ProfilerEnv,
  type ProfilerFromEnvOptions,
  createProfilerSinkFromEnv,
  readProfilerEnv,
} from "./env.js";
export {
  type ComponentMeasureTotal,
  type ProfileSummary,
  type SummarizeOptions,
  summarizeProfile,
} from "./summarize.js";
