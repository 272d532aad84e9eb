import { z } from 'zod';

const choiceSchema = z
  .union([
    z.string(),
    z.object({
      name: z.string(),
      value: z.string(),
      description: z.string().optional(),
    }),
  ])
  .transform((choice) => (typeof choice === 'string' ? { name: choice, value: choice } : choice));

export type Choice = z.output<typeof choiceSchema>;

const correlationIdSchema = z.string().min(1);

/**
 * Kinds that carry a correlation id and are answered by a `submit` with the same id.
 */
export const requestEnvelopeSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('arg'),
    id: correlationIdSchema,
    placeholder: z.string().default(''),
    choices: z.array(choiceSchema).default([]),
  }),
  z.object({
    type: z.literal('div'),
    id: correlationIdSchema,
    html: z.string(),
    tailwind: z.string().optional(),
  }),
  z.object({
    type: z.literal('editor'),
    id: correlationIdSchema,
    content: z.string().optional(),
    language: z.string().optional(),
  }),
  z.object({
    type: z.literal('form'),
    id: correlationIdSchema,
    html: z.string(),
  }),
  z.object({
    type: z.literal('path'),
    id: correlationIdSchema,
    startPath: z.string().optional(),
    hint: z.string().optional(),
  }),
  z.object({
    type: z.literal('env'),
    id: correlationIdSchema,
    key: z.string().min(1),
    prompt: z.string().optional(),
    secret: z.boolean().optional(),
  }),
  z.object({
    type: z.literal('template'),
    id: correlationIdSchema,
    template: z.string(),
  }),
]);

export const submitEnvelopeSchema = z.object({
  type: z.literal('submit'),
  id: correlationIdSchema,
  value: z
    .string()
    .nullish()
    .transform((value) => value ?? null),
});

// Fire-and-forget kinds; an id is carried through when present but never answered.
export const noticeEnvelopeSchema = z.discriminatedUnion('type', [
  z
    .object({
      type: z.literal('update'),
      id: correlationIdSchema.optional(),
    })
    .passthrough(),
  z.object({
    type: z.literal('setInput'),
    id: correlationIdSchema.optional(),
    value: z.string(),
  }),
  z.object({
    type: z.literal('setPlaceholder'),
    id: correlationIdSchema.optional(),
    text: z.string(),
  }),
  z.object({
    type: z.literal('setHint'),
    id: correlationIdSchema.optional(),
    text: z.string(),
  }),
  z.object({
    type: z.literal('setChoices'),
    id: correlationIdSchema.optional(),
    choices: z.array(choiceSchema),
  }),
  z.object({
    type: z.literal('show'),
    id: correlationIdSchema.optional(),
  }),
  z.object({
    type: z.literal('hide'),
    id: correlationIdSchema.optional(),
  }),
  z.object({
    type: z.literal('exit'),
    id: correlationIdSchema.optional(),
    code: z.number().int().optional(),
    message: z.string().optional(),
  }),
]);

export type RequestEnvelope = z.output<typeof requestEnvelopeSchema>;
export type SubmitEnvelope = z.output<typeof submitEnvelopeSchema>;
export type NoticeEnvelope = z.output<typeof noticeEnvelopeSchema>;

export type RequestKind = RequestEnvelope['type'];
export type NoticeKind = NoticeEnvelope['type'];

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** A prompt as the host hands it to a session: input-shaped fields, id assigned on send. */
export type PromptRequest = DistributiveOmit<z.input<typeof requestEnvelopeSchema>, 'id'>;

/** A fire-and-forget envelope as the host sends it. */
export type NoticeInput = z.input<typeof noticeEnvelopeSchema>;

export interface UnknownEnvelope {
  readonly type: 'unknown';
  readonly tag: string;
  readonly id?: string;
  readonly fields: Readonly<Record<string, unknown>>;
}

export type Envelope = RequestEnvelope | SubmitEnvelope | NoticeEnvelope | UnknownEnvelope;

export type EnvelopeType = Envelope['type'];

export const REQUEST_KINDS: readonly RequestKind[] = [
  'arg',
  'div',
  'editor',
  'form',
  'path',
  'env',
  'template',
];

export const NOTICE_KINDS: readonly NoticeKind[] = [
  'update',
  'setInput',
  'setPlaceholder',
  'setHint',
  'setChoices',
  'show',
  'hide',
  'exit',
];

export function isRequestKind(value: string): value is RequestKind {
  return REQUEST_KINDS.some((kind) => kind === value);
}

export function isNoticeKind(value: string): value is NoticeKind {
  return NOTICE_KINDS.some((kind) => kind === value);
}

export function isRequestEnvelope(envelope: Envelope): envelope is RequestEnvelope {
  return isRequestKind(envelope.type);
}

export function envelopeId(envelope: Envelope): string | null {
  return envelope.id ?? null;
}
