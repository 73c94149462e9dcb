import { InjectConnection } from '@nestjs/mongoose';
import { Connection } from 'mongoose';
import { Command, CommandRunner } from 'nest-commander';
import { AppLoggerService } from '@infrastructure/observability/logging/app-logger.service';

/**
 * Builds the indexes declared on the schemas and drops the ones no schema declares.
 */
@Command({
  name: 'sync-indexes',
  description: 'Synchronise MongoDB indexes with the schema definitions',
})
export class SyncIndexesCommand extends CommandRunner {
  constructor(
    @InjectConnection() private readonly connection: Connection,
    private readonly appLogger: AppLoggerService,
  ) {
    super();
  }

  async run(): Promise<void> {
    for (const model of Object.values(this.connection.models)) {
      const collection = model.collection.collectionName;
      const startedAt = Date.now();
      try {
        const dropped = await model.syncIndexes();
        this.appLogger.logDBOperation({
          operation: 'sync',
          collection,
          durationMs: Date.now() - startedAt,
          success: true,
        });
        // eslint-disable-next-line no-console
        console.log(`   ${collection}: synced (${dropped.length} dropped)`);
      } catch (error) {
        this.appLogger.logDBOperation({
          operation: 'sync',
          collection,
          durationMs: Date.now() - startedAt,
          success: false,
          error: error instanceof Error ? error.message : String(error),
        });
        throw error;
      }
    }
  }
}
