// src/logger.ts

/**
 * Timestamped console logging
 */

function timestamp(): string {
    return new Date().toISOString();
}

export function log(message: string): void {
    console.log(`[${timestamp()}] ${message}`);
}

export function logWarning(message: string): void {
    console.warn(`[${timestamp()}] WARN ${message}`);
}

export function logError(message: string, err?: unknown): void {
    if (err === undefined) {
        console.error(`[${timestamp()}] ERROR ${message}`);
        return;
    }
    console.error(`[${timestamp()}] ERROR ${message}`, err);
}

export function logSection(title: string): void {
    console.log('\n' + '='.repeat(80));
    console.log(title);
    console.log('='.repeat(80) + '\n');
}
