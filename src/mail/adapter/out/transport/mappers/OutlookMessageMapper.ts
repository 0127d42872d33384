import type {OutboundMessage} from '../../../../domain/model/OutboundMessage'

/**
 * Outlook REST API の sendmail リクエストボディ
 *
 * API 側のプロパティ名は PascalCase。
 */
export interface OutlookSendMailRequest {
    Message: {
        Subject: string
        Body: {
            ContentType: string
            Content: string
        }
        ToRecipients: Array<{
            EmailAddress: {
                Address: string
            }
        }>
    }
    SaveToSentItems: boolean
}

/**
 * ドメインの OutboundMessage を API のリクエストボディに変換
 */
export function toOutlookSendMailRequest(
    message: OutboundMessage,
    saveToSentItems: boolean
): OutlookSendMailRequest {
    return {
        Message: {
            Subject: message.subject,
            Body: {
                ContentType: message.body.contentType,
                Content: message.body.content,
            },
            ToRecipients: message.toRecipients.map((recipient) => ({
                EmailAddress: {
                    Address: recipient.emailAddress.address,
                },
            })),
        },
        SaveToSentItems: saveToSentItems,
    }
}
