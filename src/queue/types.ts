import type { GenerationJob, GenerationStats, StageName, StageReport } from '../types.js';

export type JobStatus = 'pending' | 'running' | 'completed' | 'failed';

export interface JobRecord {
  id: string;
  spec: GenerationJob;
  status: JobStatus;
  currentStage: StageName | null;
  stageReports: StageReport[];
  stats: GenerationStats | null;
  lastError: string | null;
  createdAt: Date;
  updatedAt: Date;
}
