import {zValidator} from '@hono/zod-validator';
import {Hono} from 'hono';
import {container} from 'tsyringe';
import type {MailSessionUseCase} from '../../../application/port/in/MailSessionUseCase';
import {MailSessionUseCaseToken} from '../../../application/port/in/MailSessionUseCase';
import type {SendMailUseCase} from '../../../application/port/in/SendMailUseCase';
import {SendMailUseCaseToken} from '../../../application/port/in/SendMailUseCase';
import {AuthenticationFailureException} from '../../../domain/exception/AuthenticationFailureException';
import {TransportFailureException} from '../../../domain/exception/TransportFailureException';
import {toErrorResponse, toSuccessResponse} from './mappers/SendMailMapper';
import type {MailServiceStatusWebResponse, MailSessionStatusWebResponse} from './models/SendMailWebResponse';
import {
    MailServiceWebRequestSchema,
    MailSessionWebRequestSchema,
    SendMailWebRequestSchema
} from './models/SendMailWebRequest';

export const mailRouter = new Hono();

/**
 * POST /api/mail/send
 * JSONボディでメール送信リクエストを受け付ける
 */
mailRouter.post(
    '/mail/send',
    zValidator('json', SendMailWebRequestSchema),
    async (c): Promise<Response> => {
        // 1. リクエストボディからバリデーション済みデータを取得
        const request = c.req.valid('json');

        // 2. DIコンテナからユースケースを取得
        const sendMailUseCase = container.resolve<SendMailUseCase>(SendMailUseCaseToken);

        // 3. 送信を開始（設定不足ならここで同期的に返る）
        const result = sendMailUseCase.sendMail(request.to, request.subject, request.body);

        if (!result.ok) {
            return c.json(
                toErrorResponse(
                    result.error.message,
                    'CONFIGURATION_MISSING',
                    {missingKeys: result.error.missingKeys}
                ),
                503
            );
        }

        try {
            // 4. 送信結果を待つ
            await result.value;

            return c.json(toSuccessResponse(request), 200);

        } catch (error) {
            // 認証失敗（セッションなし・トークンなし）
            if (error instanceof AuthenticationFailureException) {
                return c.json(
                    toErrorResponse(
                        error.message,
                        'AUTHENTICATION_FAILED',
                        {resourceId: error.resourceId}
                    ),
                    401
                );
            }

            // メールサービス側のエラー
            if (error instanceof TransportFailureException) {
                return c.json(
                    toErrorResponse(
                        error.message,
                        'TRANSPORT_FAILED',
                        {status: error.status}
                    ),
                    502
                );
            }

            // 予期しないエラー
            console.error('Unexpected error:', error);

            const errorMessage = error instanceof Error ? error.message : 'Unknown error occurred';

            return c.json(toErrorResponse(errorMessage, 'INTERNAL_ERROR'), 500);
        }
    }
);

/**
 * GET /api/mail/service
 * 送信できる状態かを返す
 */
mailRouter.get('/mail/service', (c) => {
    const sendMailUseCase = container.resolve<SendMailUseCase>(SendMailUseCaseToken);
    const response: MailServiceStatusWebResponse = {ready: sendMailUseCase.isReady()};
    return c.json(response, 200);
});

/**
 * PUT /api/mail/service
 * ディスカバリ処理が見つけたリソースID・エンドポイントURIを設定する
 */
mailRouter.put(
    '/mail/service',
    zValidator('json', MailServiceWebRequestSchema),
    (c) => {
        const request = c.req.valid('json');
        const sendMailUseCase = container.resolve<SendMailUseCase>(SendMailUseCaseToken);

        if (request.resourceId !== undefined) {
            sendMailUseCase.setServiceResourceId(request.resourceId);
        }
        if (request.endpointUri !== undefined) {
            sendMailUseCase.setServiceEndpointUri(request.endpointUri);
        }

        const response: MailServiceStatusWebResponse = {ready: sendMailUseCase.isReady()};
        return c.json(response, 200);
    }
);

/**
 * GET /api/mail/session
 * 送信に使うサインインセッションがあるかを返す
 */
mailRouter.get('/mail/session', (c) => {
    const mailSessionUseCase = container.resolve<MailSessionUseCase>(MailSessionUseCaseToken);
    const response: MailSessionStatusWebResponse = {signedIn: mailSessionUseCase.isSignedIn()};
    return c.json(response, 200);
});

/**
 * PUT /api/mail/session
 * クライアント側のサインインフローで得たトークンを渡す
 */
mailRouter.put(
    '/mail/session',
    zValidator('json', MailSessionWebRequestSchema),
    async (c): Promise<Response> => {
        const request = c.req.valid('json');
        const mailSessionUseCase = container.resolve<MailSessionUseCase>(MailSessionUseCaseToken);

        try {
            await mailSessionUseCase.signIn(request);
        } catch (error) {
            if (error instanceof AuthenticationFailureException) {
                return c.json(
                    toErrorResponse(error.message, 'AUTHENTICATION_FAILED', {resourceId: error.resourceId}),
                    401
                );
            }
            throw error;
        }

        const response: MailSessionStatusWebResponse = {signedIn: mailSessionUseCase.isSignedIn()};
        return c.json(response, 200);
    }
);

/**
 * DELETE /api/mail/session
 * サインインセッションを破棄する
 */
mailRouter.delete('/mail/session', async (c): Promise<Response> => {
    const mailSessionUseCase = container.resolve<MailSessionUseCase>(MailSessionUseCaseToken);

    try {
        await mailSessionUseCase.signOut();
    } catch (error) {
        if (error instanceof AuthenticationFailureException) {
            return c.json(
                toErrorResponse(error.message, 'AUTHENTICATION_FAILED', {resourceId: error.resourceId}),
                401
            );
        }
        throw error;
    }

    const response: MailSessionStatusWebResponse = {signedIn: mailSessionUseCase.isSignedIn()};
    return c.json(response, 200);
});
