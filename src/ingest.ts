import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { LogIngestionService, IngestionRunOptions } from './modules/ingestion/services/log-ingestion.service';
import { describeError } from './common/errors';

const logger = new Logger('IngestCli');

const USAGE = 'usage: npm run ingest -- [--dir <path>] [--max-files <n>] [--rebuild]';

/**
 * Parse `--dir <path> --max-files <n> --rebuild`
 */
export function parseIngestArgs(argv: string[]): IngestionRunOptions {
  const options: IngestionRunOptions = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--dir': {
        const value = argv[++i];
        if (!value) {
          throw new Error(`--dir needs a path\n${USAGE}`);
        }
        options.directory = value;
        break;
      }
      case '--max-files': {
        const value = Number(argv[++i]);
        if (!Number.isInteger(value) || value < 1) {
          throw new Error(`--max-files needs a positive integer\n${USAGE}`);
        }
        options.maxFiles = value;
        break;
      }
      case '--rebuild':
        options.rebuild = true;
        break;
      default:
        throw new Error(`unknown argument '${arg}'\n${USAGE}`);
    }
  }

  return options;
}

async function main(): Promise<void> {
  const options = parseIngestArgs(process.argv.slice(2));
  const app = await NestFactory.createApplicationContext(AppModule, {
    abortOnError: false,
  });

  try {
    const report = await app.get(LogIngestionService).run(options);
    logger.log(JSON.stringify(report, null, 2));
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error(`Ingestion failed: ${describeError(error)}`);
    process.exitCode = 1;
  });
}
