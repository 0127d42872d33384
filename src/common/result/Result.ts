/**
 * 成功 / 失敗のどちらか一方だけを持つ値
 *
 * 【使いどころ】
 * 例外を投げずに「前提条件を満たしているか」を呼び出し側へ返したい場面で使う。
 * ok で分岐すると、TypeScript が value / error のどちらにアクセスできるかを絞り込む。
 *
 * @example
 * ```typescript
 * const result = configuration.snapshot()
 * if (!result.ok) {
 *     console.error(result.error.message)
 *     return
 * }
 * console.log(result.value.endpointUri)
 * ```
 */
export type Result<T, E extends Error = Error> = Ok<T> | Err<E>

export interface Ok<T> {
    readonly ok: true
    readonly value: T
}

export interface Err<E extends Error> {
    readonly ok: false
    readonly error: E
}

export function ok<T>(value: T): Ok<T> {
    return {ok: true, value}
}

export function err<E extends Error>(error: E): Err<E> {
    return {ok: false, error}
}
