/**
 * 認証失敗例外
 *
 * 認証プロバイダーが資格情報リゾルバーを用意できなかったときに投げられる。
 * 例: サインイン済みのセッションがない、セッションにアクセストークンがない
 *
 * MailDispatchService はこの例外を変換せず、そのまま送信結果の reject として返す。
 */
export class AuthenticationFailureException extends Error {
    constructor(
        message: string,
        public readonly resourceId: string | null = null
    ) {
        super(message)
        this.name = 'AuthenticationFailureException'
    }
}
