import type {Result} from '../../../../common/result/Result'
import type {ConfigurationMissingException} from '../../../domain/exception/ConfigurationMissingException'

/**
 * sendMail の戻り値
 *
 * - ok: false → 設定不足。非同期処理は始まっていない
 * - ok: true  → value は送信結果の Promise
 *               成功なら true、失敗なら認証 / 送信のエラーで reject される
 */
export type SendMailResult = Result<Promise<boolean>, ConfigurationMissingException>

/**
 * メール送信ユースケース（入力ポート）
 *
 * Web アダプターなど外側からはこのインターフェースだけを見る。
 */
export interface SendMailUseCase {
    /**
     * ディスカバリで得たリソースIDを保存
     */
    setServiceResourceId(serviceResourceId: string): void

    /**
     * ディスカバリで得たエンドポイントURIを保存
     */
    setServiceEndpointUri(serviceEndpointUri: string): void

    /**
     * リソースIDとエンドポイントURIの両方が設定済みか
     */
    isReady(): boolean

    /**
     * サインイン中のユーザーとしてメールを送信
     *
     * @param emailAddress 宛先メールアドレス
     * @param subject 件名
     * @param body 本文（HTML）
     */
    sendMail(emailAddress: string, subject: string, body: string): SendMailResult
}

export const SendMailUseCaseToken = Symbol('SendMailUseCase')
