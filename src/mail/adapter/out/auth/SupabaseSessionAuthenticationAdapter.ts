import type {AuthChangeEvent} from '@supabase/supabase-js'
import {inject, injectable} from 'tsyringe'
import type {ProviderSession, SupabaseAuthClient} from '../../../../config/types'
import {SupabaseAuthClientToken} from '../../../../config/types'
import type {
    AuthenticationProviderPort,
    CredentialResolver
} from '../../../application/port/out/AuthenticationProviderPort'
import type {
    AuthenticationSessionPort,
    SessionTokens
} from '../../../application/port/out/AuthenticationSessionPort'
import {AuthenticationFailureException} from '../../../domain/exception/AuthenticationFailureException'
import {BearerCredentialResolver} from './BearerCredentialResolver'

/**
 * Supabase Auth のセッションを使う認証アダプター
 *
 * 【仕組み】
 * - Supabase Auth で OAuth プロバイダー（メールサービス側の IdP）にサインインすると、
 *   セッションの provider_token にそのプロバイダーのアクセストークンが入る
 * - このアダプターは onAuthStateChange でセッションの変化を追いかけ、
 *   provider_token をメールサービス用の資格情報として渡す
 *
 * 【セッションの受け取り方】
 * サインイン処理そのもの（signInWithOAuth など）はクライアント側で行う。
 * クライアントは得たトークンを PUT /api/mail/session で渡し、
 * signIn が auth.setSession でサーバー側のセッションを復元する。
 * setSession が作るセッションには provider_token が入らないので、
 * 渡された providerToken を別に保持する。
 */
@injectable()
export class SupabaseSessionAuthenticationAdapter implements AuthenticationProviderPort, AuthenticationSessionPort {
    private session: ProviderSession | null = null
    private providerToken: string | null = null
    private resourceId: string | null = null
    private readonly subscription: { unsubscribe(): void }

    constructor(
        @inject(SupabaseAuthClientToken) private readonly auth: SupabaseAuthClient
    ) {
        const {data} = auth.onAuthStateChange(
            (event: AuthChangeEvent, session: ProviderSession | null) => {
                this.acceptSession(session)
                console.log(`🔐 Supabase auth state changed: ${event}`)
            }
        )
        this.subscription = data.subscription

        console.log('✅ SupabaseSessionAuthenticationAdapter initialized')
    }

    async signIn(tokens: SessionTokens): Promise<void> {
        if (tokens.refreshToken === undefined) {
            throw new AuthenticationFailureException(
                'A refresh token is required to restore a Supabase session',
                this.resourceId
            )
        }

        const {data, error} = await this.auth.setSession({
            access_token: tokens.accessToken,
            refresh_token: tokens.refreshToken,
        })

        if (error !== null) {
            throw new AuthenticationFailureException(
                `Supabase rejected the session: ${error.message}`,
                this.resourceId
            )
        }
        if (data.session === null) {
            throw new AuthenticationFailureException('Supabase returned no session', this.resourceId)
        }

        this.providerToken = null
        this.acceptSession(data.session)
        if (this.providerToken === null && tokens.providerToken !== undefined) {
            this.providerToken = tokens.providerToken
        }

        console.log(`🔐 Supabase session restored for user ${data.session.user.id}`)
    }

    async signOut(): Promise<void> {
        const {error} = await this.auth.signOut({scope: 'local'})

        // Supabase 側の失敗に関係なく、このプロセスではセッションを捨てる
        this.acceptSession(null)

        if (error !== null) {
            throw new AuthenticationFailureException(
                `Supabase sign-out failed: ${error.message}`,
                this.resourceId
            )
        }
    }

    hasSession(): boolean {
        return this.session !== null
    }

    setResourceId(resourceId: string): void {
        this.resourceId = resourceId
    }

    getDependencyResolver(): CredentialResolver {
        if (this.resourceId === null) {
            throw new AuthenticationFailureException(
                'A resource id must be set before requesting a dependency resolver'
            )
        }

        const session = this.session
        if (session === null) {
            throw new AuthenticationFailureException(
                'No signed-in session: sign in through Supabase Auth first',
                this.resourceId
            )
        }

        const providerToken = this.providerToken
        if (providerToken === null || providerToken.length === 0) {
            throw new AuthenticationFailureException(
                `Session of user ${session.user.id} has no provider token for ${this.resourceId}`,
                this.resourceId
            )
        }

        return new BearerCredentialResolver(this.resourceId, providerToken)
    }

    /**
     * セッションの購読を解除（コンテナのリセット時に呼ぶ）
     */
    dispose(): void {
        this.subscription.unsubscribe()
    }

    // トークン更新でも provider_token は付かないことがあるので、ある時だけ上書きする
    private acceptSession(session: ProviderSession | null): void {
        if (session === null) {
            this.session = null
            this.providerToken = null
            return
        }

        if (this.session !== null && this.session.user.id !== session.user.id) {
            this.providerToken = null
        }
        this.session = session

        const providerToken = session.provider_token
        if (providerToken !== undefined && providerToken !== null && providerToken.length > 0) {
            this.providerToken = providerToken
        }
    }
}
