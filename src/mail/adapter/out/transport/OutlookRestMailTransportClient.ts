import type {CredentialResolver} from '../../../application/port/out/AuthenticationProviderPort'
import type {
    MailTransportClient,
    MailTransportClientFactory,
    SendReceipt
} from '../../../application/port/out/MailTransportClient'
import {TransportFailureException} from '../../../domain/exception/TransportFailureException'
import type {OutboundMessage} from '../../../domain/model/OutboundMessage'
import {toOutlookSendMailRequest} from './mappers/OutlookMessageMapper'

/**
 * Outlook REST API（/me/sendmail）を使ったメール送信クライアント
 *
 * 【責務】
 * - MailTransportClient インターフェースの実装
 * - ドメインのメッセージを API の JSON に変換して POST する
 * - HTTP エラー・通信エラーを TransportFailureException に変換する
 *
 * リトライ・タイムアウトは行わない。
 */
export class OutlookRestMailTransportClient implements MailTransportClient {
    private readonly sendMailUrl: string

    constructor(
        endpointUri: string,
        private readonly credentialResolver: CredentialResolver,
        private readonly fetchFn: typeof fetch = fetch
    ) {
        this.sendMailUrl = `${endpointUri.replace(/\/+$/, '')}/me/sendmail`
    }

    async sendMessage(message: OutboundMessage, saveToSentItems: boolean): Promise<SendReceipt> {
        // 資格情報の取得に失敗した場合はそのまま伝播させる
        const authorization = await this.credentialResolver.getAuthorizationHeader()

        console.log(`📧 Sending mail via ${this.sendMailUrl}`)

        let response: Response
        try {
            response = await this.fetchFn(this.sendMailUrl, {
                method: 'POST',
                headers: {
                    'Authorization': authorization,
                    'Content-Type': 'application/json',
                    'Accept': 'application/json',
                },
                body: JSON.stringify(toOutlookSendMailRequest(message, saveToSentItems)),
            })
        } catch (error) {
            const detail = error instanceof Error ? error.message : String(error)
            throw new TransportFailureException(null, detail, {cause: error})
        }

        if (!response.ok) {
            let text = ''
            try {
                text = await response.text()
            } catch (error) {
                // 本文が読めなくてもステータスは分かっているので、送信失敗として扱う
                throw new TransportFailureException(response.status, response.statusText, {cause: error})
            }
            throw new TransportFailureException(response.status, text || response.statusText)
        }

        return {
            status: response.status,
            messageId: response.headers.get('request-id'),
        }
    }
}

/**
 * OutlookRestMailTransportClient のファクトリー
 */
export class OutlookRestMailTransportClientFactory implements MailTransportClientFactory {
    constructor(private readonly fetchFn: typeof fetch = fetch) {}

    create(endpointUri: string, credentialResolver: CredentialResolver): MailTransportClient {
        return new OutlookRestMailTransportClient(endpointUri, credentialResolver, this.fetchFn)
    }
}
