import {inject, injectable} from 'tsyringe'
import type {MailSessionUseCase} from '../port/in/MailSessionUseCase'
import type {AuthenticationSessionPort, SessionTokens} from '../port/out/AuthenticationSessionPort'
import {AuthenticationSessionPortToken} from '../port/out/AuthenticationSessionPort'

const TAG = 'MailSessionService'

/**
 * サインインセッション管理サービス
 *
 * トークンの検証や保存は認証アダプターが行う。ここではログを残して委譲するだけ。
 */
@injectable()
export class MailSessionService implements MailSessionUseCase {
    constructor(
        @inject(AuthenticationSessionPortToken)
        private readonly authenticationSession: AuthenticationSessionPort
    ) {}

    async signIn(tokens: SessionTokens): Promise<void> {
        try {
            await this.authenticationSession.signIn(tokens)
            console.log(`✅ [${TAG}] signIn - Session stored`)
        } catch (error) {
            console.error(`❌ [${TAG}] signIn - ${error instanceof Error ? error.message : String(error)}`)
            throw error
        }
    }

    async signOut(): Promise<void> {
        await this.authenticationSession.signOut()
        console.log(`👋 [${TAG}] signOut - Session cleared`)
    }

    isSignedIn(): boolean {
        return this.authenticationSession.hasSession()
    }
}
