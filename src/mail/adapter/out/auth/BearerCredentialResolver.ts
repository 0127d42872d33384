import type {CredentialResolver} from '../../../application/port/out/AuthenticationProviderPort'

/**
 * 取得済みのアクセストークンを Bearer ヘッダーとして渡すリゾルバー
 */
export class BearerCredentialResolver implements CredentialResolver {
    constructor(
        public readonly resourceId: string,
        private readonly accessToken: string
    ) {}

    async getAuthorizationHeader(): Promise<string> {
        return `Bearer ${this.accessToken}`
    }
}
