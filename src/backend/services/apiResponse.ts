import { ApiResponse } from '../../shared/types';

export const DEFAULT_SUCCESS_MESSAGE = 'Request processed successfully';
export const DEFAULT_FAILURE_MESSAGE = 'Request failed';

export function success<T>(data: T, message: string = DEFAULT_SUCCESS_MESSAGE): ApiResponse<T> {
    return { success: true, message, data };
}

/**
 * Failure envelope; `detail` is what the client may see about the error.
 */
export function failure(detail: string, message: string = DEFAULT_FAILURE_MESSAGE): ApiResponse<string> {
    return { success: false, message, data: detail };
}
