import 'reflect-metadata';
import {Hono} from 'hono';
import {container} from 'tsyringe';
import {initializeApplication} from './config/app-initializer';
import {mailRouter} from './mail/adapter/in/web/SendMailController';
import type {SendMailUseCase} from './mail/application/port/in/SendMailUseCase';
import {SendMailUseCaseToken} from './mail/application/port/in/SendMailUseCase';
import type {AppBindings} from './types/bindings';

/**
 * Honoアプリケーションを作成
 *
 * DIコンテナの初期化もここで行う（2回目以降の呼び出しでは再初期化しない）。
 */
export function createApp(env: AppBindings): Hono {
    initializeApplication(env);

    const app = new Hono();

    // ルートエンドポイント
    app.get('/', (c) => {
        return c.json({
            message: 'Mail Dispatch API - Hexagonal Architecture with Hono + TypeScript',
            version: '1.0.0',
            endpoints: {
                sendMail: 'POST /api/mail/send',
                serviceStatus: 'GET /api/mail/service',
                configureService: 'PUT /api/mail/service',
                sessionStatus: 'GET /api/mail/session',
                signIn: 'PUT /api/mail/session',
                signOut: 'DELETE /api/mail/session',
            },
        });
    });

    // APIルーターをマウント
    app.route('/api', mailRouter);

    // ヘルスチェックエンドポイント
    app.get('/health', (c) => {
        const sendMailUseCase = container.resolve<SendMailUseCase>(SendMailUseCaseToken);
        return c.json({
            status: 'healthy',
            mail: {
                ready: sendMailUseCase.isReady(),
            },
        });
    });

    return app;
}
