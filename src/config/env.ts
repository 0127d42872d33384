import {AppBindingsSchema} from '../types/bindings'
import type {AppBindings} from '../types/bindings'

/**
 * 環境変数を検証して AppBindings に変換
 *
 * 不正な値があれば起動時点で落とす。
 *
 * @param source 読み込み元（省略時は process.env）
 */
export function loadBindings(source: NodeJS.ProcessEnv = process.env): AppBindings {
    const result = AppBindingsSchema.safeParse(source)

    if (!result.success) {
        throw new Error(
            `Invalid environment: ${result.error.issues.map((issue) => issue.message).join(', ')}`
        )
    }

    return result.data
}
