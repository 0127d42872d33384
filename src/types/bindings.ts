import {z} from 'zod'

/**
 * 環境変数のスキーマ
 *
 * 空文字は「未設定」として扱う（.env に `KEY=` とだけ書かれているケース）。
 */
const optionalString = z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === '' ? undefined : value.trim()))

export const AppBindingsSchema = z
    .object({
        PORT: z.coerce.number().int().positive().default(8787),
        USE_SUPABASE: z.enum(['true', 'false']).default('false'),
        SUPABASE_URL: optionalString,
        SUPABASE_PUBLISHABLE_KEY: optionalString,
        MAIL_ACCESS_TOKEN: optionalString,
        MAIL_SERVICE_RESOURCE_ID: optionalString,
        MAIL_SERVICE_ENDPOINT_URI: optionalString,
    })
    .superRefine((env, ctx) => {
        if (env.USE_SUPABASE !== 'true') {
            return
        }
        if (env.SUPABASE_URL === undefined) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['SUPABASE_URL'],
                message: 'SUPABASE_URL is required when USE_SUPABASE=true',
            })
        }
        if (env.SUPABASE_PUBLISHABLE_KEY === undefined) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['SUPABASE_PUBLISHABLE_KEY'],
                message: 'SUPABASE_PUBLISHABLE_KEY is required when USE_SUPABASE=true',
            })
        }
    })

/**
 * アプリケーションの環境変数とバインディングの型定義
 */
export type AppBindings = z.infer<typeof AppBindingsSchema>
