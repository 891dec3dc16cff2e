// src/utils/batchId.ts

const pad = (value: number, width: number = 2): string => String(value).padStart(width, '0');

/** `batch-YYYYMMDD-HHMMSS`, in UTC. */
export function generateBatchId(date: Date = new Date()): string {
    const day = `${pad(date.getUTCFullYear(), 4)}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
    const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
    return `batch-${day}-${time}`;
}

/** Caller input wins when it has any non-blank content. */
export function resolveBatchId(input: string | undefined, now: Date = new Date()): string {
    const trimmed = input?.trim();
    return trimmed ? trimmed : generateBatchId(now);
}
