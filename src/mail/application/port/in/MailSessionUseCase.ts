import type {SessionTokens} from '../out/AuthenticationSessionPort'

/**
 * メール送信に使うサインインセッションの管理（入力ポート）
 */
export interface MailSessionUseCase {
    signIn(tokens: SessionTokens): Promise<void>

    signOut(): Promise<void>

    isSignedIn(): boolean
}

export const MailSessionUseCaseToken = Symbol('MailSessionUseCase')
