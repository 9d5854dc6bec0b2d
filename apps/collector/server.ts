// ============================================================
// 自定义 HTTP 服务器
// 包装 Next.js App Router；采集运行时由 instrumentation register() 启动
// 开发: npm run dev   → npm_lifecycle_event='dev'   → NODE_ENV=development
// 生产: npm run start → npm_lifecycle_event='start' → NODE_ENV=production
// ============================================================

import { createServer } from 'node:http';
import next from 'next';
import { loadConfig } from '@/lib/config';
import { stopAppRuntime } from '@/lib/runtime';

// 通过 npm_lifecycle_event 自动推断运行模式（dev vs start）
if (!process.env.NODE_ENV) {
  (process.env as Record<string, string | undefined>).NODE_ENV =
    process.env.npm_lifecycle_event === 'dev' ? 'development' : 'production';
}

const SHUTDOWN_TIMEOUT_MS = 5_000;

const dev = process.env.NODE_ENV !== 'production';
const { host: hostname, port } = loadConfig();

const app = next({ dev, hostname, port });
const handle = app.getRequestHandler();

app
  .prepare()
  .then(() => {
    const server = createServer((req, res) => {
      handle(req, res).catch((err) => {
        console.error('[Server] 请求处理异常:', err);
        if (!res.headersSent) {
          res.statusCode = 500;
        }
        res.end();
      });
    });

    server.on('error', (err) => {
      console.error('[Server] HTTP 服务器异常:', err);
      stopAppRuntime()
        .catch((closeErr) => {
          console.error('[Server] 关闭失败:', closeErr);
        })
        .finally(() => process.exit(1));
    });

    server.listen(port, hostname, () => {
      const displayHost = hostname === '0.0.0.0' ? 'localhost' : hostname;
      console.log(`> 服务器就绪: http://${displayHost}:${port}`);
      console.log(`> 模式: ${dev ? '开发' : '生产'}`);
    });

    // 优雅关闭：停止接收请求，等待当前采集周期写完，再关闭数据库
    let shuttingDown = false;
    const shutdown = (): void => {
      if (shuttingDown) return;
      shuttingDown = true;
      console.log('\n> 正在关闭服务器...');

      // 强制退出保底
      setTimeout(() => process.exit(1), SHUTDOWN_TIMEOUT_MS).unref();

      server.close();
      stopAppRuntime()
        .then(() => {
          console.log('> 服务器已关闭');
          process.exit(0);
        })
        .catch((err) => {
          console.error('[Server] 关闭失败:', err);
          process.exit(1);
        });
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  })
  .catch((err) => {
    console.error('[Server] 启动失败:', err);
    process.exit(1);
  });
