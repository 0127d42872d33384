import type {OutboundMessage} from '../../../domain/model/OutboundMessage'
import type {CredentialResolver} from './AuthenticationProviderPort'

/**
 * メールサービスが受け付けたことを表す受領情報
 */
export interface SendReceipt {
    /**
     * メールサービスが返した数値の応答コード
     */
    readonly status: number

    /**
     * メールサービスが付けたリクエスト / メッセージの識別子（返ってこなければ null）
     */
    readonly messageId: string | null
}

/**
 * メール送信クライアント（出力ポート）
 */
export interface MailTransportClient {
    /**
     * @param message 送信するメッセージ
     * @param saveToSentItems 送信済みフォルダーにコピーを残すか
     */
    sendMessage(message: OutboundMessage, saveToSentItems: boolean): Promise<SendReceipt>
}

/**
 * 送信クライアントの生成
 *
 * エンドポイントと資格情報は送信のたびに変わりうるので、
 * クライアントはコンテナに登録せず、このファクトリーから毎回作る。
 */
export interface MailTransportClientFactory {
    create(endpointUri: string, credentialResolver: CredentialResolver): MailTransportClient
}

export const MailTransportClientFactoryToken = Symbol('MailTransportClientFactory')
