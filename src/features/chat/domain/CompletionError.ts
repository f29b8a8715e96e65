/**
 * Layer A: Domain Rules - 补全失败分类
 *
 * Every kind maps to a fixed, pre-written message. These strings are what the
 * user sees and what gets remembered in history; they must never carry raw
 * exception text, endpoints or credential fragments.
 */

export type CompletionErrorKind =
    | 'ConnectionError'
    | 'AuthenticationError'
    | 'ConfigurationError'
    | 'RateLimited'
    | 'ModelUnavailable'
    | 'UnknownCompletionError';

export const COMPLETION_ERROR_MESSAGES: Record<CompletionErrorKind, string> = {
    ConnectionError:
        '❌ **Connection Error**\n\nUnable to connect to the AI service. Please check:\n• Your internet connection\n• Service availability\n• Network settings',
    AuthenticationError:
        '❌ **Authentication Error**\n\nThe AI service rejected the configured credentials. Please contact the administrator.',
    ConfigurationError:
        '❌ **Configuration Error**\n\nThe AI service endpoint or model is not configured correctly. Please contact the administrator.',
    RateLimited:
        '❌ **Rate Limit Exceeded**\n\nToo many requests. Please wait a moment and try again.',
    ModelUnavailable:
        '❌ **Model Error**\n\nThe requested AI model is not available. Please check your model configuration.',
    UnknownCompletionError:
        '❌ **Error**\n\nSomething went wrong while processing your request. Please try again.',
};

export function completionErrorMessage(kind: CompletionErrorKind): string {
    return COMPLETION_ERROR_MESSAGES[kind];
}

/** Kinds a user can fix by simply trying again later */
export function isRetryable(kind: CompletionErrorKind): boolean {
    return kind === 'ConnectionError' || kind === 'RateLimited';
}
