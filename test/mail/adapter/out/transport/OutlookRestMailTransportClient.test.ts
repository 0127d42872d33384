import {beforeEach, describe, expect, it, vi} from "vitest"
import {
    OutlookRestMailTransportClient,
    OutlookRestMailTransportClientFactory
} from "../../../../../src/mail/adapter/out/transport/OutlookRestMailTransportClient"
import type {CredentialResolver} from "../../../../../src/mail/application/port/out/AuthenticationProviderPort"
import {AuthenticationFailureException} from "../../../../../src/mail/domain/exception/AuthenticationFailureException"
import {TransportFailureException} from "../../../../../src/mail/domain/exception/TransportFailureException"
import {OutboundMessage} from "../../../../../src/mail/domain/model/OutboundMessage"

/**
 * OutlookRestMailTransportClient のテスト
 *
 * 【テスト戦略】
 * - fetch を差し替えて、実際の HTTP 通信は行わない
 * - URL・ヘッダー・JSON ボディが正しく組み立てられることを検証
 * - HTTP エラーと通信エラーの変換を検証
 */
describe("OutlookRestMailTransportClient", () => {
    const fetchMock = vi.fn<typeof fetch>()
    let credentialResolver: CredentialResolver
    let client: OutlookRestMailTransportClient

    const message = OutboundMessage.html("a@b.com", "Hi", "<b>hello</b>")

    beforeEach(() => {
        vi.clearAllMocks()

        credentialResolver = {
            resourceId: "res-1",
            getAuthorizationHeader: vi.fn<CredentialResolver["getAuthorizationHeader"]>()
                .mockResolvedValue("Bearer test-token"),
        }

        client = new OutlookRestMailTransportClient("https://mail.example/api", credentialResolver, fetchMock)
    })

    describe("sendMessage - 正常系", () => {
        it("/me/sendmail に JSON を POST すること", async () => {
            // Given
            fetchMock.mockResolvedValueOnce(new Response(null, {status: 202}))

            // When
            await client.sendMessage(message, true)

            // Then
            expect(fetchMock).toHaveBeenCalledTimes(1)
            const [url, init] = fetchMock.mock.calls[0]
            expect(url).toBe("https://mail.example/api/me/sendmail")
            expect(init?.method).toBe("POST")
            expect(init?.headers).toEqual({
                "Authorization": "Bearer test-token",
                "Content-Type": "application/json",
                "Accept": "application/json",
            })
        })

        it("メッセージを API の形式に変換して送ること", async () => {
            fetchMock.mockResolvedValueOnce(new Response(null, {status: 202}))

            await client.sendMessage(message, true)

            const [, init] = fetchMock.mock.calls[0]
            expect(JSON.parse(String(init?.body))).toEqual({
                Message: {
                    Subject: "Hi",
                    Body: {ContentType: "HTML", Content: "<b>hello</b>"},
                    ToRecipients: [{EmailAddress: {Address: "a@b.com"}}],
                },
                SaveToSentItems: true,
            })
        })

        it("saveToSentItems をそのまま渡すこと", async () => {
            fetchMock.mockResolvedValueOnce(new Response(null, {status: 202}))

            await client.sendMessage(message, false)

            const [, init] = fetchMock.mock.calls[0]
            expect(JSON.parse(String(init?.body))).toMatchObject({SaveToSentItems: false})
        })

        it("ステータスと request-id を受領情報として返すこと", async () => {
            fetchMock.mockResolvedValueOnce(
                new Response(null, {status: 202, headers: {"request-id": "req-123"}})
            )

            await expect(client.sendMessage(message, true)).resolves.toEqual({
                status: 202,
                messageId: "req-123",
            })
        })

        it("request-id がなければ messageId は null になること", async () => {
            fetchMock.mockResolvedValueOnce(new Response(null, {status: 202}))

            await expect(client.sendMessage(message, true)).resolves.toEqual({
                status: 202,
                messageId: null,
            })
        })

        it("エンドポイント末尾のスラッシュを取り除くこと", async () => {
            fetchMock.mockResolvedValueOnce(new Response(null, {status: 202}))
            const trailing = new OutlookRestMailTransportClient("https://mail.example/api/", credentialResolver, fetchMock)

            await trailing.sendMessage(message, true)

            expect(fetchMock.mock.calls[0][0]).toBe("https://mail.example/api/me/sendmail")
        })
    })

    describe("sendMessage - 異常系", () => {
        it("2xx 以外ならステータスと本文を持つ TransportFailureException を投げること", async () => {
            fetchMock.mockResolvedValueOnce(new Response("Unauthorized token", {status: 401}))

            const error = await client.sendMessage(message, true).catch((e: unknown) => e)

            expect(error).toBeInstanceOf(TransportFailureException)
            expect(error).toMatchObject({
                status: 401,
                message: "Mail transport failed with status 401: Unauthorized token",
            })
        })

        it("本文が空ならステータステキストを使うこと", async () => {
            fetchMock.mockResolvedValueOnce(
                new Response("", {status: 500, statusText: "Internal Server Error"})
            )

            await expect(client.sendMessage(message, true)).rejects.toThrow(
                "Mail transport failed with status 500: Internal Server Error"
            )
        })

        it("2xx 以外で本文の読み取りに失敗してもステータス付きの TransportFailureException を投げること", async () => {
            const response = new Response("partial", {status: 503, statusText: "Service Unavailable"})
            const readError = new TypeError("terminated")
            vi.spyOn(response, "text").mockRejectedValueOnce(readError)
            fetchMock.mockResolvedValueOnce(response)

            const error = await client.sendMessage(message, true).catch((e: unknown) => e)

            expect(error).toBeInstanceOf(TransportFailureException)
            expect(error).toMatchObject({
                status: 503,
                message: "Mail transport failed with status 503: Service Unavailable",
                cause: readError,
            })
        })

        it("通信エラーは status null の TransportFailureException に変換すること", async () => {
            const networkError = new TypeError("fetch failed")
            fetchMock.mockRejectedValueOnce(networkError)

            const error = await client.sendMessage(message, true).catch((e: unknown) => e)

            expect(error).toBeInstanceOf(TransportFailureException)
            expect(error).toMatchObject({
                status: null,
                message: "Mail transport failed: fetch failed",
                cause: networkError,
            })
        })

        it("資格情報の取得に失敗したらそのまま伝播し、リクエストしないこと", async () => {
            const authError = new AuthenticationFailureException("token expired", "res-1")
            vi.mocked(credentialResolver.getAuthorizationHeader).mockRejectedValueOnce(authError)

            await expect(client.sendMessage(message, true)).rejects.toBe(authError)
            expect(fetchMock).not.toHaveBeenCalled()
        })
    })
})

describe("OutlookRestMailTransportClientFactory", () => {
    it("渡したエンドポイントと fetch を使うクライアントを作ること", async () => {
        const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response(null, {status: 202}))
        const credentialResolver: CredentialResolver = {
            resourceId: "res-1",
            getAuthorizationHeader: () => Promise.resolve("Bearer test-token"),
        }

        const client = new OutlookRestMailTransportClientFactory(fetchMock)
            .create("https://mail.example/api", credentialResolver)
        await client.sendMessage(OutboundMessage.html("a@b.com", "Hi", "body"), true)

        expect(fetchMock.mock.calls[0][0]).toBe("https://mail.example/api/me/sendmail")
    })
})
