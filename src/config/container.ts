/**
 * DIコンテナ設定ファイル
 *
 * 【登録するもの】
 * - MailServiceConfiguration: リソースIDとエンドポイントURI（1つだけ）
 * - AuthenticationProviderPort / AuthenticationSessionPort: 環境変数で実装を切り替える
 *     - USE_SUPABASE=true  → SupabaseSessionAuthenticationAdapter
 *     - USE_SUPABASE=false → StaticTokenAuthenticationAdapter（MAIL_ACCESS_TOKEN）
 * - MailTransportClientFactory: Outlook REST クライアントのファクトリー
 * - SendMailUseCase: MailDispatchService（シングルトン）
 * - MailSessionUseCase: MailSessionService
 *
 * Application層はポート（インターフェース）にしか依存しないので、
 * ここでの登録を変えるだけで実装を差し替えられる。
 */

import 'reflect-metadata'; // tsyringe が必要とするメタデータ機能を有効化
import {AuthClient} from '@supabase/supabase-js';
import {container} from 'tsyringe';
import {StaticTokenAuthenticationAdapter} from '../mail/adapter/out/auth/StaticTokenAuthenticationAdapter';
import {SupabaseSessionAuthenticationAdapter} from '../mail/adapter/out/auth/SupabaseSessionAuthenticationAdapter';
import {OutlookRestMailTransportClientFactory} from '../mail/adapter/out/transport/OutlookRestMailTransportClient';
import {MailSessionUseCaseToken} from '../mail/application/port/in/MailSessionUseCase';
import {SendMailUseCaseToken} from '../mail/application/port/in/SendMailUseCase';
import {AuthenticationProviderPortToken} from '../mail/application/port/out/AuthenticationProviderPort';
import {AuthenticationSessionPortToken} from '../mail/application/port/out/AuthenticationSessionPort';
import {MailTransportClientFactoryToken} from '../mail/application/port/out/MailTransportClient';
import {MailDispatchService} from '../mail/application/service/MailDispatchService';
import {MailSessionService} from '../mail/application/service/MailSessionService';
import {MailServiceConfiguration} from '../mail/domain/model/MailServiceConfiguration';
import type {AppBindings} from '../types/bindings';
import type {SupabaseAuthClient, SupabaseConfig} from './types';
import {MailServiceConfigurationToken, SupabaseAuthClientToken} from './types';

// 初期化済みフラグ（複数回初期化を防ぐ）
let isInitialized = false;

// リセット時に購読を解除するため保持しておく
let supabaseAuthAdapter: SupabaseSessionAuthenticationAdapter | null = null;

/**
 * DIコンテナの初期化と依存関係の登録
 *
 * アプリケーション起動時に一度だけ実行される。
 *
 * @param env 検証済みの環境変数
 */
export function setupContainer(env: AppBindings): void {
    if (isInitialized) {
        return;
    }

    console.log('🚀 Initializing DI container...');

    // ========================================
    // 1. 設定オブジェクトの登録
    // ========================================

    /**
     * 初期値は空。MAIL_SERVICE_* があれば setupMailContext が反映する。
     */
    container.register(MailServiceConfigurationToken, {
        useValue: new MailServiceConfiguration(),
    });

    // ========================================
    // 2. 認証アダプターの登録
    // ========================================

    const useSupabase = env.USE_SUPABASE === 'true';

    if (useSupabase && env.SUPABASE_URL !== undefined && env.SUPABASE_PUBLISHABLE_KEY !== undefined) {
        console.log('📦 Using Supabase session authentication');

        const supabaseConfig: SupabaseConfig = {
            url: env.SUPABASE_URL,
            key: env.SUPABASE_PUBLISHABLE_KEY,
        };

        // createClient は Realtime も初期化し、ネイティブ WebSocket のない Node.js 20 では例外になる。
        // Auth クライアントだけを作る。
        const supabaseAuthClient: SupabaseAuthClient = new AuthClient({
            url: `${supabaseConfig.url.replace(/\/+$/, '')}/auth/v1`,
            headers: {
                'apikey': supabaseConfig.key,
                'Authorization': `Bearer ${supabaseConfig.key}`,
                'x-application-name': 'mail-dispatch',
            },
            persistSession: false, // サーバープロセスなのでメモリ上だけで保持する
            autoRefreshToken: false,
            detectSessionInUrl: false,
        });

        container.register(SupabaseAuthClientToken, {
            useValue: supabaseAuthClient,
        });

        container.registerSingleton(
            SupabaseSessionAuthenticationAdapter,
            SupabaseSessionAuthenticationAdapter
        );

        container.register(AuthenticationProviderPortToken, {
            useToken: SupabaseSessionAuthenticationAdapter,
        });
        container.register(AuthenticationSessionPortToken, {
            useToken: SupabaseSessionAuthenticationAdapter,
        });

        supabaseAuthAdapter = container.resolve(SupabaseSessionAuthenticationAdapter);
    } else {
        console.log('🔑 Using static token authentication');

        // 送信用とセッション管理用で同じインスタンスを共有する
        const staticTokenAdapter = new StaticTokenAuthenticationAdapter(env.MAIL_ACCESS_TOKEN ?? null);

        container.register(AuthenticationProviderPortToken, {
            useValue: staticTokenAdapter,
        });
        container.register(AuthenticationSessionPortToken, {
            useValue: staticTokenAdapter,
        });
    }

    // ========================================
    // 3. 送信クライアントのファクトリー
    // ========================================

    container.register(MailTransportClientFactoryToken, {
        useValue: new OutlookRestMailTransportClientFactory(),
    });

    // ========================================
    // 4. アプリケーションサービスの登録
    // ========================================

    /**
     * 設定を保持するのでシングルトン。
     * SendMailUseCaseToken で resolve しても同じインスタンスが返る。
     */
    container.registerSingleton(MailDispatchService, MailDispatchService);
    container.register(SendMailUseCaseToken, {
        useToken: MailDispatchService,
    });

    container.register(MailSessionUseCaseToken, {
        useClass: MailSessionService,
    });

    isInitialized = true;
    console.log(`✅ DI container initialized (Supabase: ${useSupabase ? 'enabled' : 'disabled'})`);
}

/**
 * コンテナをリセット（主にテスト用）
 */
export function resetContainer(): void {
    supabaseAuthAdapter?.dispose();
    supabaseAuthAdapter = null;
    container.reset();
    isInitialized = false;
    console.log('🔄 DI container reset');
}

export {container};
