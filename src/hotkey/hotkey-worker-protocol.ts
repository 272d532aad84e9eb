import { z } from 'zod';

const keyStrokeSchema = z.object({
  key: z.string().min(1),
  ctrl: z.boolean(),
  alt: z.boolean(),
  shift: z.boolean(),
  meta: z.boolean(),
});

const hotkeyIdSchema = z.number().int().positive();

export const hostToWorkerMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('register'),
    requestId: z.number().int(),
    hotkeyId: hotkeyIdSchema,
    stroke: keyStrokeSchema,
  }),
  z.object({
    type: z.literal('unregister'),
    hotkeyId: hotkeyIdSchema,
  }),
  z.object({
    type: z.literal('stop'),
  }),
]);

export const workerToHostMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('ready'),
  }),
  z.object({
    type: z.literal('registered'),
    requestId: z.number().int(),
    ok: z.boolean(),
    detail: z.string().optional(),
  }),
  z.object({
    type: z.literal('wake'),
  }),
  z.object({
    type: z.literal('error'),
    message: z.string(),
  }),
]);

export const hotkeyWorkerDataSchema = z
  .object({
    ringBuffer: z.instanceof(SharedArrayBuffer),
  })
  .passthrough();

export type HostToWorkerMessage = z.infer<typeof hostToWorkerMessageSchema>;
export type WorkerToHostMessage = z.infer<typeof workerToHostMessageSchema>;
