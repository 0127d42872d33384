/**
 * 資格情報リゾルバー
 *
 * 送信クライアントはリクエストのたびにここから Authorization ヘッダーを受け取る。
 * トークンの取得・更新の方法はリゾルバーの実装側が知っている。
 */
export interface CredentialResolver {
    /**
     * このリゾルバーが対象とするリソースID
     */
    readonly resourceId: string

    /**
     * Authorization ヘッダーの値（例: "Bearer xxx"）
     */
    getAuthorizationHeader(): Promise<string>
}

/**
 * 認証プロバイダー（出力ポート）
 *
 * 【責務】
 * - どのリソース向けのトークンが必要かを受け取る
 * - サインイン済みのセッションから資格情報リゾルバーを作る
 *
 * トークンの取得（サインインフロー）自体はこのポートの外の話。
 *
 * 【実装例】
 * - StaticTokenAuthenticationAdapter: 事前に取得したトークンを使う
 * - SupabaseSessionAuthenticationAdapter: Supabase Auth のセッションを使う
 */
export interface AuthenticationProviderPort {
    setResourceId(resourceId: string): void

    /**
     * @throws AuthenticationFailureException サインイン済みのセッションがない場合
     */
    getDependencyResolver(): CredentialResolver
}

export const AuthenticationProviderPortToken = Symbol('AuthenticationProviderPort')
