import { randomUUID } from 'crypto';
import { readFile, stat } from 'fs/promises';
import { Injectable, Logger, LoggerService, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { IngestionReportDto } from '../../../dto';
import { describeError } from '../../../common/errors';
import { TimeSeriesStore } from '../../time-series/stores/time-series.store';
import { LogLineParser } from '../parsing/log-line.parser';
import {
  buildSearchPatterns,
  CandidateFilter,
  parseTagIds,
  SearchPatternSettings,
} from '../parsing/search-patterns';
import { TagResolver } from '../tag-resolver';
import { LogFileInfo, LogFileSource } from '../sources/log-file-source';

const MAX_REPORTED_WARNINGS = 100;

export interface IngestionRunOptions {
  directory?: string;
  maxFiles?: number;
  rebuild?: boolean;
}

/**
 * Mutable counters for a run in progress
 */
type RunTally = Omit<IngestionReportDto, 'runId' | 'startedAt' | 'finishedAt' | 'directory'>;

interface RunContext {
  logger: LoggerService;
  filter: CandidateFilter;
  parser: LogLineParser;
  resolver: TagResolver;
  tally: RunTally;
}

/**
 * Batch ingestion of crane controller logs into the time-series store.
 *
 * Per run:
 * 1. Load the tag search list and the tag mapping
 * 2. Discover .log/.zip files, newest first, capped at maxFiles
 * 3. Pre-filter each line by substring, then parse the survivors
 * 4. Write one sample per parsed line; existing keys are left untouched
 *
 * A bad line, file or write is counted and logged, never fatal.
 */
@Injectable()
export class LogIngestionService {
  constructor(
    private readonly timeSeries: TimeSeriesStore,
    private readonly configService: ConfigService,
    private readonly logFileSource: LogFileSource,
  ) {}

  async run(options: IngestionRunOptions = {}, logger?: LoggerService): Promise<IngestionReportDto> {
    const runId = randomUUID().slice(0, 8);
    const log = logger ?? new Logger(`LogIngestion:${runId}`);
    const startedAt = new Date();

    const directory =
      options.directory ?? this.configService.get<string>('LOG_DIRECTORY', './logs');
    const maxFiles =
      options.maxFiles ?? this.configService.get<number>('INGEST_MAX_FILES', 9999);

    await this.assertDirectory(directory);

    const settings = this.searchSettings();
    const tagIds = await this.loadTagIds();
    const filter = new CandidateFilter(buildSearchPatterns(settings, tagIds));
    const resolver = await TagResolver.load(
      this.configService.get<string>('TAG_CHANGE_FILE', './data/TAG_CHANGE.csv'),
      log,
    );

    log.log(`Run ${runId}: ${tagIds.length} tag ids, ${filter.size} search patterns`);

    if (options.rebuild) {
      await this.timeSeries.clear();
      log.warn('Rebuild requested: all stored samples were deleted');
    }

    const discovered = await this.logFileSource.discover(directory);
    const selected = discovered.slice(0, maxFiles);
    log.log(`Found ${discovered.length} files in '${directory}', scanning ${selected.length}`);

    const context: RunContext = {
      logger: log,
      filter,
      parser: new LogLineParser(settings),
      resolver,
      tally: {
        filesDiscovered: discovered.length,
        filesProcessed: 0,
        filesFailed: 0,
        linesScanned: 0,
        candidateLines: 0,
        samplesInserted: 0,
        duplicateSamples: 0,
        parseFailures: 0,
        timestampFailures: 0,
        writeFailures: 0,
        warnings: [],
      },
    };

    for (const file of selected) {
      await this.processFile(file, context);
    }

    const { tally } = context;
    log.log(
      `Run ${runId} finished: ${tally.filesProcessed} files, ${tally.candidateLines} candidate lines, ` +
        `${tally.samplesInserted} inserted, ${tally.duplicateSamples} duplicates, ` +
        `${tally.parseFailures + tally.timestampFailures} unparsed, ${tally.writeFailures} write failures`,
    );

    return {
      runId,
      startedAt: startedAt.toISOString(),
      finishedAt: new Date().toISOString(),
      directory,
      ...tally,
    };
  }

  private async processFile(file: LogFileInfo, context: RunContext): Promise<void> {
    const { logger, tally } = context;
    logger.log(`Processing ${file.kind.toUpperCase()}: ${file.name}`);
    tally.filesProcessed++;

    const documents = await this.logFileSource.read(file);
    for (const document of documents) {
      if ('error' in document) {
        tally.filesFailed++;
        logger.error(`Skipping ${document.source}: ${document.error}`);
        this.recordWarning(context, `${document.source}: ${document.error}`);
        continue;
      }

      try {
        for await (const line of document.lines) {
          await this.processLine(line, document.source, context);
        }
      } catch (error) {
        tally.filesFailed++;
        logger.error(`Stopped reading ${document.source}: ${describeError(error)}`);
        this.recordWarning(context, `${document.source}: ${describeError(error)}`);
      }
    }
  }

  private async processLine(line: string, source: string, context: RunContext): Promise<void> {
    const { logger, tally } = context;
    tally.linesScanned++;

    if (!context.filter.matches(line)) {
      return;
    }
    tally.candidateLines++;

    const outcome = context.parser.parse(line);
    if (!outcome.ok) {
      if (outcome.reason === 'timestamp') {
        tally.timestampFailures++;
      } else {
        tally.parseFailures++;
      }
      const message = `${source}: ${outcome.message}`;
      logger.warn(message);
      this.recordWarning(context, message);
      return;
    }

    const { equipmentId, tagDetail, timestamp, result } = outcome.line;
    const metricName = context.resolver.resolve(tagDetail);

    try {
      const inserted = await this.timeSeries.insertSample(equipmentId, metricName, timestamp, result);
      if (inserted) {
        tally.samplesInserted++;
        logger.debug?.(`Stored ${equipmentId}/${metricName} @ ${timestamp.toISOString()}`);
      } else {
        tally.duplicateSamples++;
      }
    } catch (error) {
      tally.writeFailures++;
      logger.error(
        `Failed to store ${equipmentId}/${metricName} @ ${timestamp.toISOString()}: ${describeError(error)}`,
      );
    }
  }

  private recordWarning(context: RunContext, message: string): void {
    if (context.tally.warnings.length < MAX_REPORTED_WARNINGS) {
      context.tally.warnings.push(message);
    }
  }

  private searchSettings(): SearchPatternSettings {
    return {
      equipmentPrefix: this.configService.get<string>('EQUIPMENT_PREFIX', 'RMG'),
      rangeStart: this.configService.get<number>('EQUIPMENT_RANGE_START', 1),
      rangeEnd: this.configService.get<number>('EQUIPMENT_RANGE_END', 12),
      staticPrefix: this.configService.get<string>('STATIC_PREFIX', 'CRANE.STATISTIC'),
      statisticType: this.configService.get<string>('STATISTIC_TYPE', 'Perma'),
    };
  }

  private async loadTagIds(): Promise<string[]> {
    const path = this.configService.get<string>('TAG_SEARCH_FILE', './data/TAG_SEARCH.txt');
    try {
      return parseTagIds(await readFile(path, 'utf8'));
    } catch (error) {
      throw new NotFoundException(`Tag search list '${path}' unreadable: ${describeError(error)}`);
    }
  }

  private async assertDirectory(directory: string): Promise<void> {
    const isDirectory = await stat(directory).then(
      (stats) => stats.isDirectory(),
      () => false,
    );
    if (!isDirectory) {
      throw new NotFoundException(`Log directory '${directory}' not found`);
    }
  }
}
