import {describe, expect, it} from "vitest"
import {BodyType, OutboundMessage, Recipient} from "../../../src/mail/domain/model/OutboundMessage"

describe("OutboundMessage", () => {
    describe("html", () => {
        it("宛先1件のメッセージを作ること", () => {
            const message = OutboundMessage.html("a@b.com", "Hi", "<b>hello</b>")

            expect(message.toRecipients).toHaveLength(1)
            expect(message.toRecipients[0].emailAddress.address).toBe("a@b.com")
        })

        it("本文を HTML として保持すること", () => {
            const message = OutboundMessage.html("a@b.com", "Hi", "<b>hello</b>")

            expect(message.subject).toBe("Hi")
            expect(message.body.contentType).toBe(BodyType.HTML)
            expect(message.body.content).toBe("<b>hello</b>")
        })

        it("アドレスの形式はチェックせずそのまま保持すること", () => {
            const message = OutboundMessage.html("not-an-address", "", "")

            expect(message.toRecipients[0].emailAddress.address).toBe("not-an-address")
            expect(message.subject).toBe("")
            expect(message.body.content).toBe("")
        })
    })

    describe("Recipient.of", () => {
        it("アドレスを EmailAddress で包むこと", () => {
            expect(Recipient.of("x@example.com").emailAddress.address).toBe("x@example.com")
        })
    })
})
