import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { Container } from '../../../container';
import { DeviceStatusSchema, type DeviceRecord } from '../../../domain/entities/device';

const MacParamsSchema = z.object({ mac: z.string() });
const ListQuerySchema = z.object({ status: DeviceStatusSchema.optional() });
const PutBodySchema = z.object({
  status: DeviceStatusSchema,
  comment: z.string().max(500).optional()
});
const PatchBodySchema = z
  .object({
    status: DeviceStatusSchema.optional(),
    comment: z.string().max(500).optional()
  })
  .refine((body) => body.status !== undefined || body.comment !== undefined, {
    message: 'status or comment is required'
  });

const toResponse = (device: DeviceRecord) => ({
  mac: device.mac,
  status: device.status,
  first_seen: device.firstSeen.toISOString(),
  last_seen: device.lastSeen.toISOString(),
  comment: device.comment
});

export const devicesRoutes = async (app: FastifyInstance, { container }: { container: Container }) => {
  const { policy } = container.services;

  app.get('/devices', async (request, reply) => {
    const parsed = ListQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'VALIDATION', issues: parsed.error.issues });
    }
    const devices = await policy.list(parsed.data.status);
    return { devices: devices.map(toResponse) };
  });

  app.get('/devices/:mac', async (request) => {
    const { mac } = MacParamsSchema.parse(request.params);
    return toResponse(await policy.get(mac));
  });

  app.put('/devices/:mac', async (request, reply) => {
    const { mac } = MacParamsSchema.parse(request.params);
    const parsed = PutBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'VALIDATION', issues: parsed.error.issues });
    }
    const change = await policy.setPolicy(mac, parsed.data.status, parsed.data.comment);
    return { device: toResponse(change.device), enforcement: change.enforcement };
  });

  app.patch('/devices/:mac', async (request, reply) => {
    const { mac } = MacParamsSchema.parse(request.params);
    const parsed = PatchBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'VALIDATION', issues: parsed.error.issues });
    }
    const change = await policy.patch(mac, parsed.data);
    return { device: toResponse(change.device), enforcement: change.enforcement };
  });

  app.delete('/devices/:mac', async (request, reply) => {
    const { mac } = MacParamsSchema.parse(request.params);
    await policy.remove(mac);
    return reply.status(204).send();
  });
};
