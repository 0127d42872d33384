import type {AuthChangeEvent} from '@supabase/supabase-js'

/**
 * Supabase 接続設定
 */
export interface SupabaseConfig {
    url: string
    key: string
}

/**
 * 認証アダプターが参照するセッションの項目
 */
export interface ProviderSession {
    readonly provider_token?: string | null
    readonly user: {
        readonly id: string
    }
}

/**
 * 認証アダプターが使う Supabase Auth クライアントの範囲
 *
 * @supabase/supabase-js の AuthClient のうち、セッションの購読・復元・破棄だけに依存する。
 */
export interface SupabaseAuthClient {
    onAuthStateChange(
        callback: (event: AuthChangeEvent, session: ProviderSession | null) => void
    ): { data: { subscription: { unsubscribe(): void } } }

    setSession(tokens: {
        access_token: string
        refresh_token: string
    }): Promise<{ data: { session: ProviderSession | null }; error: { message: string } | null }>

    signOut(options: { scope: 'local' }): Promise<{ error: { message: string } | null }>
}

/**
 * DI用のトークン
 */
export const SupabaseAuthClientToken = Symbol('SupabaseAuthClient')

export const MailServiceConfigurationToken = Symbol('MailServiceConfiguration')
