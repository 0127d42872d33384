import {z} from 'zod';

/**
 * Web層専用のリクエストモデル
 */
export interface SendMailWebRequest {
    to: string;
    subject: string;
    body: string;
}

/**
 * POST /api/mail/send のバリデーションスキーマ
 */
export const SendMailWebRequestSchema = z.object({
    to: z.string().email('to must be a valid email address'),
    subject: z.string(),
    body: z.string(),
});

/**
 * PUT /api/mail/service のバリデーションスキーマ
 *
 * ディスカバリ処理が見つけた値を渡す。片方だけの更新も受け付ける。
 */
export const MailServiceWebRequestSchema = z
    .object({
        resourceId: z.string().min(1, 'resourceId must not be empty').optional(),
        endpointUri: z.string().url('endpointUri must be a valid URL').optional(),
    })
    .refine((request) => request.resourceId !== undefined || request.endpointUri !== undefined, {
        message: 'resourceId or endpointUri is required',
    });

export type MailServiceWebRequest = z.infer<typeof MailServiceWebRequestSchema>;

/**
 * PUT /api/mail/session のバリデーションスキーマ
 *
 * クライアント側のサインインフローで得たトークンを渡す。
 */
export const MailSessionWebRequestSchema = z.object({
    accessToken: z.string().min(1, 'accessToken must not be empty'),
    refreshToken: z.string().min(1, 'refreshToken must not be empty').optional(),
    providerToken: z.string().min(1, 'providerToken must not be empty').optional(),
});

export type MailSessionWebRequest = z.infer<typeof MailSessionWebRequestSchema>;
