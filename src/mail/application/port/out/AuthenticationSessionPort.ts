/**
 * 外部のサインインフローで得たトークン
 *
 * - accessToken: セッションのアクセストークン
 *     - StaticTokenAuthenticationAdapter ではこれがそのままメールサービス用のトークン
 *     - SupabaseSessionAuthenticationAdapter では Supabase セッションのアクセストークン
 * - refreshToken: Supabase セッションの復元に使う
 * - providerToken: OAuth プロバイダー（メールサービス側の IdP）のアクセストークン
 */
export interface SessionTokens {
    accessToken: string
    refreshToken?: string
    providerToken?: string
}

/**
 * 認証セッション（出力ポート）
 *
 * サインインフローの外で取得したトークンを認証プロバイダーに渡す入口。
 * AuthenticationProviderPort と同じアダプターが実装する。
 */
export interface AuthenticationSessionPort {
    /**
     * @throws AuthenticationFailureException トークンが受け付けられなかった場合
     */
    signIn(tokens: SessionTokens): Promise<void>

    signOut(): Promise<void>

    hasSession(): boolean
}

export const AuthenticationSessionPortToken = Symbol('AuthenticationSessionPort')
