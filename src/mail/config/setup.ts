import type {DependencyContainer} from 'tsyringe'
import type {AppBindings} from '../../types/bindings'
import type {SendMailUseCase} from '../application/port/in/SendMailUseCase'
import {SendMailUseCaseToken} from '../application/port/in/SendMailUseCase'

/**
 * メールコンテキストの初期化
 *
 * 【責務】
 * - 環境変数にディスカバリ結果（リソースID・エンドポイントURI）があれば反映する
 * - 起動時点で送信できる状態かをログに出す
 *
 * 環境変数になければ、外部のディスカバリ処理が
 * PUT /api/mail/service で後から設定する。
 */
export function setupMailContext(env: AppBindings, container: DependencyContainer): void {
    console.log('📬 Setting up mail context...')

    const sendMailUseCase = container.resolve<SendMailUseCase>(SendMailUseCaseToken)

    if (env.MAIL_SERVICE_RESOURCE_ID !== undefined) {
        sendMailUseCase.setServiceResourceId(env.MAIL_SERVICE_RESOURCE_ID)
    }
    if (env.MAIL_SERVICE_ENDPOINT_URI !== undefined) {
        sendMailUseCase.setServiceEndpointUri(env.MAIL_SERVICE_ENDPOINT_URI)
    }

    if (sendMailUseCase.isReady()) {
        console.log('✅ Mail context ready')
    } else {
        console.warn('⚠️ Mail service is not configured yet; sendMail is rejected until discovery completes')
    }
}
