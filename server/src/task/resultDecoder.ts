import { z } from 'zod';

const okEnvelopeSchema = z.object({ status: z.literal('ok') }).passthrough();

const errorEnvelopeSchema = z.object({
    status: z.literal('error'),
    error: z.string(),
    details: z.unknown().optional()
});

export const resultEnvelopeSchema = z.discriminatedUnion('status', [okEnvelopeSchema, errorEnvelopeSchema]);

export type ResultEnvelope = z.infer<typeof resultEnvelopeSchema>;

export type DecodeResult =
    | { kind: 'ok'; value: Record<string, unknown> }
    | { kind: 'worker-error'; message: string; details?: unknown }
    // Partial write observed mid-flush; retry on the next tick.
    | { kind: 'incomplete'; reason: string }
    | { kind: 'invalid'; reason: string };

export function decodeResult(text: string): DecodeResult {
    if (text.trim().length === 0) {
        return { kind: 'incomplete', reason: 'Result file is empty.' };
    }
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        return {
            kind: 'incomplete',
            reason: error instanceof Error ? error.message : 'Result file is not valid JSON.'
        };
    }
    const parsed = resultEnvelopeSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
        return { kind: 'invalid', reason: `Result envelope rejected${where}: ${issue?.message ?? 'unknown shape'}` };
    }
    const envelope = parsed.data;
    if (envelope.status === 'error') {
        return envelope.details === undefined
            ? { kind: 'worker-error', message: envelope.error }
            : { kind: 'worker-error', message: envelope.error, details: envelope.details };
    }
    const { status: _status, ...value } = envelope;
    return { kind: 'ok', value };
}

export function encodeResult(envelope: ResultEnvelope) {
    return JSON.stringify(envelope);
}
