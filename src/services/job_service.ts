import { v4 as uuidv4 } from 'uuid';
import { errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('JobService');

export type JobStatus = 'PENDING' | 'RUNNING' | 'COMPLETED' | 'FAILED';

export interface Job {
    id: string;
    type: string;
    status: JobStatus;
    payload: Record<string, unknown>;
    result?: unknown;
    error?: string;
    createdAt: string;
    updatedAt: string;
}

/**
 * In-process background jobs. State is lost on restart.
 */
export class JobService {
    private jobs: Map<string, Job> = new Map();
    private running: Map<string, Promise<Job | undefined>> = new Map();

    public createJob(type: string, payload: Record<string, unknown> = {}): Job {
        const now = new Date().toISOString();
        const job: Job = {
            id: uuidv4(),
            type,
            status: 'PENDING',
            payload,
            createdAt: now,
            updatedAt: now,
        };
        this.jobs.set(job.id, job);
        return job;
    }

    /** Resolves once the task settles; failures are recorded on the job, not rethrown. */
    public async runJob(jobId: string, task: () => Promise<unknown>): Promise<Job | undefined> {
        const job = this.jobs.get(jobId);
        if (!job) return undefined;

        job.status = 'RUNNING';
        job.updatedAt = new Date().toISOString();

        try {
            job.result = await task();
            job.status = 'COMPLETED';
        } catch (err) {
            job.status = 'FAILED';
            job.error = errorMessage(err) || 'Unknown error';
            log.error(`Job ${job.type} (${job.id}) failed: ${job.error}`);
        } finally {
            job.updatedAt = new Date().toISOString();
        }
        return job;
    }

    /** Creates a job and starts it without waiting. */
    public submit(type: string, payload: Record<string, unknown>, task: () => Promise<unknown>): Job {
        const job = this.createJob(type, payload);
        const run = this.runJob(job.id, task).finally(() => this.running.delete(job.id));
        this.running.set(job.id, run);
        return job;
    }

    /** Resolves when a submitted job has finished; immediately for unknown or finished jobs. */
    public async settled(jobId: string): Promise<Job | undefined> {
        return (await this.running.get(jobId)) ?? this.jobs.get(jobId);
    }

    public getJob(jobId: string): Job | undefined {
        return this.jobs.get(jobId);
    }

    public listJobs(): Job[] {
        return Array.from(this.jobs.values()).sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    }
}
