import 'reflect-metadata';
import { spawn } from 'child_process';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { APP_CONFIG, AppConfig } from './config/app.config';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug'],
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidUnknownValues: false,
    }),
  );

  const config = app.get<AppConfig>(APP_CONFIG);
  await app.listen(config.port);

  const logger = new Logger('Bootstrap');
  const uploadUiUrl = `http://localhost:${config.port}/reconciliation/upload-ui`;
  logger.log(`Order reconciliation API running on port ${config.port}`);
  logger.log(`Upload UI: ${uploadUiUrl}`);

  if (config.openUiOnStart) {
    openInBrowser(uploadUiUrl, logger);
  }
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    `Failed to start: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exitCode = 1;
});

function openInBrowser(url: string, logger: Logger): void {
  try {
    const child =
      process.platform === 'win32'
        ? spawn('cmd', ['/c', 'start', '', url], { detached: true, stdio: 'ignore' })
        : spawn(process.platform === 'darwin' ? 'open' : 'xdg-open', [url], {
            detached: true,
            stdio: 'ignore',
          });

    child.on('error', (error) => {
      logger.warn(`Could not auto-open browser. Open manually: ${url}. Error: ${error.message}`);
    });
    child.unref();
    logger.log('Opened upload UI in default browser');
  } catch (error: unknown) {
    logger.warn(
      `Could not auto-open browser. Open manually: ${url}. Error: ${
        error instanceof Error ? error.message : String(error)
      }`,
    );
  }
}
