/**
 * メール送信失敗例外
 *
 * 【発生条件】
 * - メールサービスが 2xx 以外のステータスを返した → status にそのコードが入る
 * - そもそもリクエストが届かなかった（DNS、接続拒否など） → status は null
 */
export class TransportFailureException extends Error {
    /**
     * HTTP ステータス（通信自体が失敗した場合は null）
     */
    public readonly status: number | null

    constructor(status: number | null, detail: string, options?: { cause?: unknown }) {
        super(
            status === null
                ? `Mail transport failed: ${detail}`
                : `Mail transport failed with status ${status.toString()}: ${detail}`,
            options
        )

        this.name = 'TransportFailureException'
        this.status = status
    }
}
