import { Request, Response, NextFunction } from 'express';

import { GenerationRecord, GenerationSettings } from '../../types/domain';

import { JobCoordinator } from './generation.service';

interface GenerationDTO {
  jobId: string;
  userId: string;
  status: GenerationRecord['status'];
  cost: number;
  prompt: string;
  error: string | null;
  result: GenerationRecord['result'];
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
}

interface CreateGenerationBody {
  userId: string;
  prompt: string;
  settings?: GenerationSettings;
  referenceImages?: string[];
}

interface CompleteGenerationBody {
  imageUrl: string;
  seed?: number;
  metadata?: Record<string, unknown>;
}

export class GenerationController {
  constructor(private readonly coordinator: JobCoordinator) {}

  private toGenerationDTO(generation: GenerationRecord): GenerationDTO {
    return {
      jobId: generation.jobId,
      userId: generation.userId,
      status: generation.status,
      cost: generation.cost,
      prompt: generation.prompt,
      error: generation.error,
      result: generation.result,
      createdAt: generation.createdAt,
      startedAt: generation.startedAt,
      completedAt: generation.completedAt,
    };
  }

  /**
   * Reserve credits and queue a generation
   * POST /generations
   */
  async create(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { userId, prompt, settings, referenceImages }: CreateGenerationBody = req.body;
      const idempotencyKey = req.get('x-idempotency-key');

      const handle = await this.coordinator.createJob({
        userId,
        prompt,
        settings,
        referenceImages,
        idempotencyKey,
      });

      res.status(handle.idempotent ? 200 : 201).json({
        success: true,
        data: handle,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /generations/:jobId
   */
  async getById(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const generation = await this.coordinator.getJob(req.params.jobId);

      res.status(200).json({
        success: true,
        data: { generation: this.toGenerationDTO(generation) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /generations/users/:userId
   */
  async listByUser(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const limit = typeof req.query.limit === 'string' ? parseInt(req.query.limit, 10) : 10;
      const generations = await this.coordinator.listUserJobs(req.params.userId, limit);

      res.status(200).json({
        success: true,
        data: {
          generations: generations.map((generation) => this.toGenerationDTO(generation)),
          count: generations.length,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Cancel a job that has not finished and return its credits
   * POST /generations/:jobId/cancel
   */
  async cancel(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { userId }: { userId: string } = req.body;
      const generation = await this.coordinator.cancel(req.params.jobId, userId);

      res.status(200).json({
        success: true,
        data: { generation: this.toGenerationDTO(generation) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Worker picked the job up
   * POST /generations/:jobId/processing
   */
  async markProcessing(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const generation = await this.coordinator.markProcessing(req.params.jobId);

      res.status(200).json({
        success: true,
        data: { generation: this.toGenerationDTO(generation) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /generations/:jobId/complete
   */
  async complete(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { imageUrl, seed, metadata }: CompleteGenerationBody = req.body;
      const generation = await this.coordinator.settle(req.params.jobId, {
        kind: 'completed',
        result: { imageUrl, seed, metadata },
      });

      res.status(200).json({
        success: true,
        data: { generation: this.toGenerationDTO(generation) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /generations/:jobId/fail
   */
  async fail(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { error: reason }: { error: string } = req.body;
      const generation = await this.coordinator.settle(req.params.jobId, {
        kind: 'failed',
        error: reason,
      });

      res.status(200).json({
        success: true,
        data: { generation: this.toGenerationDTO(generation) },
      });
    } catch (error) {
      next(error);
    }
  }
}
