import 'reflect-metadata';
import {serve} from '@hono/node-server';
import {config} from 'dotenv';
import {loadBindings} from './config/env';
import {createApp} from './index';

// .envファイルを読み込む
config();

const env = loadBindings(process.env);
const app = createApp(env);

serve({fetch: app.fetch, port: env.PORT}, (info) => {
    console.log(`📮 Mail Dispatch API listening on http://localhost:${info.port.toString()}`);
});
