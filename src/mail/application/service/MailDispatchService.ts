import {inject, injectable} from 'tsyringe'
import {MailServiceConfigurationToken} from '../../../config/types'
import {ok} from '../../../common/result/Result'
import {MailServiceConfiguration} from '../../domain/model/MailServiceConfiguration'
import {OutboundMessage} from '../../domain/model/OutboundMessage'
import type {SendMailResult, SendMailUseCase} from '../port/in/SendMailUseCase'
import type {AuthenticationProviderPort} from '../port/out/AuthenticationProviderPort'
import {AuthenticationProviderPortToken} from '../port/out/AuthenticationProviderPort'
import type {MailTransportClientFactory, SendReceipt} from '../port/out/MailTransportClient'
import {MailTransportClientFactoryToken} from '../port/out/MailTransportClient'

const TAG = 'MailDispatchService'

/**
 * メール送信アプリケーションサービス
 *
 * 【役割】
 * - 送信前提（リソースIDとエンドポイントURI）の検証
 * - 送信メッセージの組み立て
 * - 認証プロバイダーと送信クライアントへの委譲
 * - 非同期の送信結果を Promise<boolean> 1本にまとめる
 *
 * 【1回の sendMail の状態遷移】
 * NotStarted → Validating ─┬─ Rejected(ConfigurationMissing)   …同期で返る
 *                          └─ Dispatching ─┬─ Resolved(true)
 *                                          └─ Resolved(Error)  …Promise の reject
 *
 * Promise は一度しか確定しないので、成功と失敗の両方が通知されることはない。
 * リトライもタイムアウトもここでは行わない（タイムアウトは送信クライアントの責務）。
 */
@injectable()
export class MailDispatchService implements SendMailUseCase {
    constructor(
        @inject(MailServiceConfigurationToken)
        private readonly configuration: MailServiceConfiguration,
        @inject(AuthenticationProviderPortToken)
        private readonly authenticationProvider: AuthenticationProviderPort,
        @inject(MailTransportClientFactoryToken)
        private readonly transportClientFactory: MailTransportClientFactory
    ) {}

    setServiceResourceId(serviceResourceId: string): void {
        this.configuration.setResourceId(serviceResourceId)
    }

    setServiceEndpointUri(serviceEndpointUri: string): void {
        this.configuration.setEndpointUri(serviceEndpointUri)
    }

    isReady(): boolean {
        return this.configuration.isComplete()
    }

    sendMail(emailAddress: string, subject: string, body: string): SendMailResult {
        // ① 前提条件の検証（ここで失敗したら非同期処理は一切始めない）
        const readiness = this.configuration.snapshot()
        if (!readiness.ok) {
            console.error(`❌ [${TAG}] sendMail - ${readiness.error.message}`)
            return readiness
        }

        const {resourceId, endpointUri} = readiness.value

        // ② 送信（結果は Promise で返す）
        return ok(this.dispatch(resourceId, endpointUri, emailAddress, subject, body))
    }

    private dispatch(
        resourceId: string,
        endpointUri: string,
        emailAddress: string,
        subject: string,
        body: string
    ): Promise<boolean> {
        let mailSent: Promise<SendReceipt>

        try {
            this.authenticationProvider.setResourceId(resourceId)
            const credentialResolver = this.authenticationProvider.getDependencyResolver()

            const mailClient = this.transportClientFactory.create(endpointUri, credentialResolver)

            const message = OutboundMessage.html(emailAddress, subject, body)

            // 送信済みフォルダーには常にコピーを残す
            mailSent = mailClient.sendMessage(message, true)
        } catch (error) {
            console.error(`❌ [${TAG}] sendMail - ${describeError(error)}`)
            return Promise.reject(error)
        }

        return mailSent.then(
            (receipt) => {
                console.log(
                    `✅ [${TAG}] sendMail - Email sent (status: ${receipt.status.toString()}, id: ${receipt.messageId ?? 'n/a'})`
                )
                return true
            },
            (error: unknown) => {
                console.error(`❌ [${TAG}] sendMail - ${describeError(error)}`)
                throw error
            }
        )
    }
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error)
}
