import {container} from 'tsyringe'
import {setupMailContext} from '../mail/config/setup'
import type {AppBindings} from '../types/bindings'
import {resetContainer, setupContainer} from './container'

/**
 * アプリケーション全体の初期化
 *
 * 【責務】
 * 1. DIコンテナの設定（setupContainer）
 * 2. 各コンテキストの初期化（setupXxxContext）
 */

let isInitialized = false

export function initializeApplication(env: AppBindings): void {
    if (isInitialized) {
        return
    }

    console.log('🚀 Initializing application...')

    setupContainer(env)
    setupMailContext(env, container)

    isInitialized = true
    console.log('✅ Application initialized')
}

export function resetApplication(): void {
    resetContainer()
    isInitialized = false
    console.log('🔄 Application reset')
}
