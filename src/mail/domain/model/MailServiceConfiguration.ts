import type {Result} from '../../../common/result/Result'
import {err, ok} from '../../../common/result/Result'
import {ConfigurationMissingException} from '../exception/ConfigurationMissingException'

/**
 * 送信に使える状態の設定（両方とも空でない文字列）
 */
export interface ReadyMailServiceConfiguration {
    readonly resourceId: string
    readonly endpointUri: string
}

/**
 * メールサービスの設定
 *
 * 【役割】
 * - ディスカバリで得たリソースIDとエンドポイントURIを保持する
 * - 送信前に「両方そろっているか」を判定する
 *
 * 【ライフサイクル】
 * DIコンテナに1つだけ登録され、MailDispatchService に注入される。
 * 起動時（またはディスカバリ完了時）に一度設定される想定で、
 * 書き込みと送信の競合は防いでいない。呼び出し側が順序を守る。
 */
export class MailServiceConfiguration {
    private resourceId: string | null
    private endpointUri: string | null

    constructor(resourceId: string | null = null, endpointUri: string | null = null) {
        this.resourceId = resourceId
        this.endpointUri = endpointUri
    }

    setResourceId(resourceId: string): void {
        this.resourceId = resourceId
    }

    setEndpointUri(endpointUri: string): void {
        this.endpointUri = endpointUri
    }

    isComplete(): boolean {
        return isPresent(this.resourceId) && isPresent(this.endpointUri)
    }

    /**
     * 現在の値を一度だけ読み取り、送信に使える形で返す
     *
     * 両方を同じタイミングで読むので、途中で setter が呼ばれても
     * 新旧の値が混ざったまま送信されることはない。
     */
    snapshot(): Result<ReadyMailServiceConfiguration, ConfigurationMissingException> {
        const resourceId = this.resourceId
        const endpointUri = this.endpointUri

        if (!isPresent(resourceId) || !isPresent(endpointUri)) {
            return err(new ConfigurationMissingException())
        }

        return ok({resourceId, endpointUri})
    }
}

function isPresent(value: string | null): value is string {
    return value !== null && value.length > 0
}
