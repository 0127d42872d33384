/**
 * Web層専用のレスポンスモデル
 */
export interface SendMailWebResponse {
    success: boolean;
    message: string;
    data?: {
        to: string;
        subject: string;
        timestamp: string;
    };
    error?: {
        code: string;
        details?: Record<string, unknown>;
    };
}

export interface MailServiceStatusWebResponse {
    ready: boolean;
}

export interface MailSessionStatusWebResponse {
    signedIn: boolean;
}
