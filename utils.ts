export const FALLBACK_TERMINAL_WIDTH = 80;

export function terminalWidth(stream: { columns?: number } = process.stdout): number {
    const columns = stream.columns;
    if (typeof columns !== "number" || !Number.isFinite(columns) || columns <= 0) {
        return FALLBACK_TERMINAL_WIDTH;
    }
    return Math.floor(columns);
}

export function maskSecret(secret: string): string {
    return secret.length > 8 ? `${secret.slice(0, 8)}...` : secret;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
