/**
 * Layer A: Domain Rules - 认证失败分类
 */

export type AuthErrorKind =
    | 'InvalidCredential'
    | 'CapacityExceeded'
    | 'Expired'
    | 'NotRegistered'
    | 'Unknown';

export type AuthResult<T> =
    | { ok: true; value: T }
    | { ok: false; reason: AuthErrorKind };

const RELOGIN_MESSAGE = 'Your session is no longer valid. Please log in again.';

export const AUTH_ERROR_MESSAGES: Record<AuthErrorKind, string> = {
    // Does not say which part of the credential was wrong
    InvalidCredential: 'Invalid password. Please try again.',
    CapacityExceeded: 'The maximum number of active sessions has been reached. Please try again later.',
    Expired: RELOGIN_MESSAGE,
    NotRegistered: RELOGIN_MESSAGE,
    Unknown: RELOGIN_MESSAGE,
};

export function authErrorMessage(kind: AuthErrorKind): string {
    return AUTH_ERROR_MESSAGES[kind];
}

/** Failures that end the current session and force a new login */
export function requiresRelogin(kind: AuthErrorKind): boolean {
    return kind === 'Expired' || kind === 'NotRegistered' || kind === 'Unknown';
}
