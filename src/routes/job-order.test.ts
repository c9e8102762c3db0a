import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { createRouteTestApp } from '../test/test-app.js';
import { jobOrderRoutes } from './job-order.js';

const mockGetJobOrder = vi.fn();
const mockResetJobOrder = vi.fn();
const mockUpdateNextJobForJob = vi.fn();

describe('job order routes', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await createRouteTestApp();
    await app.register(jobOrderRoutes, {
      repository: {
        getJobOrder: mockGetJobOrder,
        resetJobOrder: mockResetJobOrder,
        updateNextJobForJob: mockUpdateNextJobForJob,
      },
    });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('GET /get_job_order/:workflow_type_name', () => {
    it('returns the job order', async () => {
      mockGetJobOrder.mockResolvedValue([{ job_name: 'staging-', next_job_type: 'adcirc2cog-tiff-job' }]);

      const res = await app.inject({ method: 'GET', url: '/get_job_order/ASGS' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ Response: [{ job_name: 'staging-', next_job_type: 'adcirc2cog-tiff-job' }] });
      expect(mockGetJobOrder).toHaveBeenCalledWith('ASGS');
    });

    it('rejects an unknown workflow type', async () => {
      const res = await app.inject({ method: 'GET', url: '/get_job_order/SLURM' });

      expect(res.statusCode).toBe(400);
      expect(mockGetJobOrder).not.toHaveBeenCalled();
    });

    it('returns 500 when the lookup throws', async () => {
      mockGetJobOrder.mockRejectedValue(new Error('Statement calling get_supervisor_job_order failed'));

      const res = await app.inject({ method: 'GET', url: '/get_job_order/ECFLOW' });

      expect(res.statusCode).toBe(500);
      expect(res.json()).toEqual({ error: 'Exception detected trying to get the ECFLOW job order' });
    });
  });

  describe('PUT /reset_job_order/:workflow_type_name', () => {
    it('resets the job order', async () => {
      mockResetJobOrder.mockResolvedValue(true);

      const res = await app.inject({ method: 'PUT', url: '/reset_job_order/HECRAS' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ Response: 'The HECRAS job order has been reset to the default' });
    });

    it('returns 500 when the reset was rolled back', async () => {
      mockResetJobOrder.mockResolvedValue(false);

      const res = await app.inject({ method: 'PUT', url: '/reset_job_order/ASGS' });

      expect(res.statusCode).toBe(500);
      expect(res.json()).toEqual({ error: 'Failed to reset the ASGS job order' });
    });
  });

  describe('PUT next job type', () => {
    const url = (job: string, next: string, workflow = 'ASGS') =>
      `/job_type_name/${job}/next_job_type/${next}/workflow_type_name/${workflow}`;

    it('points the job at the id of the next job type', async () => {
      mockUpdateNextJobForJob.mockResolvedValue(true);

      const res = await app.inject({ method: 'PUT', url: url('staging', 'adcirc2cog-tiff-job') });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        Response: 'The ASGS next job type for staging has been set to adcirc2cog-tiff-job',
      });
      expect(mockUpdateNextJobForJob).toHaveBeenCalledWith('staging-', 23, 'ASGS');
    });

    it('accepts complete as the next job type', async () => {
      mockUpdateNextJobForJob.mockResolvedValue(true);

      const res = await app.inject({ method: 'PUT', url: url('hazus', 'complete', 'ECFLOW') });

      expect(res.statusCode).toBe(200);
      expect(mockUpdateNextJobForJob).toHaveBeenCalledWith('hazus-', 21, 'ECFLOW');
    });

    it('refuses to point a job at itself without touching the database', async () => {
      const res = await app.inject({ method: 'PUT', url: url('staging', 'staging') });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: 'Error: The job type staging cannot be its own next job type' });
      expect(mockUpdateNextJobForJob).not.toHaveBeenCalled();
    });

    it('rejects an unknown job type', async () => {
      const res = await app.inject({ method: 'PUT', url: url('render-job', 'staging') });

      expect(res.statusCode).toBe(400);
      expect(mockUpdateNextJobForJob).not.toHaveBeenCalled();
    });

    it('returns 500 when the update fails', async () => {
      mockUpdateNextJobForJob.mockResolvedValue(false);

      const res = await app.inject({ method: 'PUT', url: url('staging', 'hazus') });

      expect(res.statusCode).toBe(500);
      expect(res.json()).toEqual({ error: 'Failed to update the next job type for staging' });
    });
  });
});
