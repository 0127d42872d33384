/**
 * 送信メッセージのドメインモデル
 *
 * 【ライフサイクル】
 * sendMail の呼び出しごとに新しく作られ、その呼び出しだけが所有する。
 * 送信クライアントに渡したあとは使い回さない。
 *
 * 【構造】
 * OutboundMessage
 *   ├─ toRecipients: Recipient[]   （宛先。現状は常に1件）
 *   │     └─ emailAddress: EmailAddress
 *   ├─ subject: string
 *   └─ body: ItemBody             （contentType + content）
 */

/**
 * 本文の種類
 */
export const BodyType = {
    Text: 'Text',
    HTML: 'HTML',
} as const

export type BodyType = (typeof BodyType)[keyof typeof BodyType]

/**
 * メールアドレス（値オブジェクト）
 *
 * 形式チェックはしない。受け取った文字列をそのまま保持する。
 */
export class EmailAddress {
    constructor(public readonly address: string) {}
}

/**
 * 宛先
 */
export class Recipient {
    constructor(public readonly emailAddress: EmailAddress) {}

    static of(address: string): Recipient {
        return new Recipient(new EmailAddress(address))
    }
}

/**
 * 本文（値オブジェクト）
 */
export class ItemBody {
    constructor(
        public readonly contentType: BodyType,
        public readonly content: string
    ) {}
}

export class OutboundMessage {
    private constructor(
        public readonly toRecipients: readonly Recipient[],
        public readonly subject: string,
        public readonly body: ItemBody
    ) {}

    /**
     * 宛先1件・HTML本文のメッセージを作成
     *
     * @param recipientAddress 宛先メールアドレス
     * @param subject 件名
     * @param htmlContent HTML として扱う本文
     */
    static html(recipientAddress: string, subject: string, htmlContent: string): OutboundMessage {
        return new OutboundMessage(
            [Recipient.of(recipientAddress)],
            subject,
            new ItemBody(BodyType.HTML, htmlContent)
        )
    }
}
