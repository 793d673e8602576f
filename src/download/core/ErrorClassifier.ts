/**
 * ErrorClassifier - Buckets engine diagnostics so the negotiator knows
 * whether trying another cookie source can possibly help
 */

import { ErrorClass } from './types';

// Content itself cannot be served: cookies won't help
export const PERMANENT_UNAVAILABLE_NEEDLES: readonly string[] = [
    'video unavailable',
    'this video is unavailable',
    'private video',
    'has been removed',
    'video has been removed',
    'does not exist',
    'content is not available',
    'content unavailable',
    'http error 404',
    'unsupported url',
    'url is invalid',
];

// Transport-level failures: timeout, DNS, connect, TLS
export const NETWORK_FAILURE_NEEDLES: readonly string[] = [
    'timed out',
    'handshake',
    'name or service not known',
    'temporary failure in name resolution',
    'nodename nor servname provided',
    'connection refused',
    'connection reset',
    'ssl',
    'certificate verify failed',
    'transporterror',
];

function containsAny(haystack: string, needles: readonly string[]): boolean {
    return needles.some((needle) => haystack.includes(needle));
}

export function isPermanentUnavailable(message?: string): boolean {
    return !!message && containsAny(message.toLowerCase(), PERMANENT_UNAVAILABLE_NEEDLES);
}

export function isNetworkFailure(message?: string): boolean {
    return !!message && containsAny(message.toLowerCase(), NETWORK_FAILURE_NEEDLES);
}

export function classifyError(message?: string): ErrorClass {
    if (isPermanentUnavailable(message)) {
        return ErrorClass.PERMANENT_UNAVAILABLE;
    }
    if (isNetworkFailure(message)) {
        return ErrorClass.NETWORK_FAILURE;
    }
    return ErrorClass.UNKNOWN;
}

/**
 * Terminal classes end the cookie search for the current URL/format
 */
export function isTerminal(errorClass: ErrorClass): boolean {
    return errorClass !== ErrorClass.UNKNOWN;
}
