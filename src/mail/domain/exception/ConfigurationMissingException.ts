// ━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
// ConfigurationMissingException（設定不足例外）
// ━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
//
// 【この例外クラスの目的】
// - メールサービスのリソースIDとエンドポイントURIが揃う前に
//   sendMail が呼ばれたことを表す
// - どの設定キーが必要かを呼び出し側に伝える
//
// 【他の例外との違い】
// - AuthenticationFailureException / TransportFailureException は
//   非同期の送信結果（Promise の reject）として届く
// - この例外だけは sendMail の戻り値（Result）で同期的に返される
//   → 認証プロバイダーにも送信クライアントにも一切触れていない
//
// 【リトライしても無駄】
// 設定が揃っていない限り何度呼んでも同じ結果になる。
// 呼び出し側は setServiceResourceId / setServiceEndpointUri を先に呼ぶ必要がある。
// ━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━

/**
 * sendMail の前に設定しておくべきキー
 */
export const REQUIRED_CONFIGURATION_KEYS = ['ServiceResourceId', 'ServiceEndpointUri'] as const

export type ConfigurationKey = (typeof REQUIRED_CONFIGURATION_KEYS)[number]

/**
 * 設定不足例外
 *
 * 【呼び出し例】
 * ```typescript
 * const result = mailDispatchService.sendMail('a@example.com', 'Hi', '<b>hello</b>')
 * if (!result.ok) {
 *     console.log(result.error.missingKeys) // ['ServiceResourceId', 'ServiceEndpointUri']
 * }
 * ```
 */
export class ConfigurationMissingException extends Error {
    /**
     * 必要な設定キー（メッセージと同じく、常に両方を列挙する）
     */
    public readonly missingKeys: readonly ConfigurationKey[]

    constructor() {
        super(
            `You must set the ${REQUIRED_CONFIGURATION_KEYS.join(' and ')} before using sendMail`
        )

        this.name = 'ConfigurationMissingException'
        this.missingKeys = [...REQUIRED_CONFIGURATION_KEYS]
    }
}
