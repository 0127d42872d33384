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
 * 事前に取得したアクセストークンを使う認証アダプター
 *
 * 【用途】
 * - ローカル開発（MAIL_ACCESS_TOKEN に貼り付けたトークンで送信する）
 * - Supabase を使わない構成
 *
 * トークンの取得や更新はしない。PUT /api/mail/session（signIn）で外から差し替える。
 */
export class StaticTokenAuthenticationAdapter implements AuthenticationProviderPort, AuthenticationSessionPort {
    private resourceId: string | null = null

    constructor(private accessToken: string | null = null) {
        console.log(
            `🔑 StaticTokenAuthenticationAdapter initialized (session: ${this.hasSession() ? 'present' : 'none'})`
        )
    }

    // accessToken をそのままメールサービス用のトークンとして使う
    async signIn(tokens: SessionTokens): Promise<void> {
        if (tokens.accessToken.length === 0) {
            throw new AuthenticationFailureException('An access token must not be empty', this.resourceId)
        }
        this.accessToken = tokens.accessToken
    }

    async signOut(): Promise<void> {
        this.accessToken = null
    }

    hasSession(): boolean {
        return this.accessToken !== null && this.accessToken.length > 0
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

        if (this.accessToken === null || this.accessToken.length === 0) {
            throw new AuthenticationFailureException(
                'No signed-in session: an access token has not been provided',
                this.resourceId
            )
        }

        return new BearerCredentialResolver(this.resourceId, this.accessToken)
    }
}
