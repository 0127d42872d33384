import type {SendMailWebRequest} from '../models/SendMailWebRequest';
import type {SendMailWebResponse} from '../models/SendMailWebResponse';

/**
 * 成功レスポンスを作成
 */
export function toSuccessResponse(
    request: SendMailWebRequest,
    timestamp: Date = new Date()
): SendMailWebResponse {
    return {
        success: true,
        message: 'Mail sent successfully',
        data: {
            to: request.to,
            subject: request.subject,
            timestamp: timestamp.toISOString(),
        },
    };
}

/**
 * エラーレスポンスを作成
 */
export function toErrorResponse(
    message: string,
    code: string,
    details?: Record<string, unknown>
): SendMailWebResponse {
    return {
        success: false,
        message,
        error: {
            code,
            details,
        },
    };
}
