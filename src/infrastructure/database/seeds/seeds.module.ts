import { Module } from '@nestjs/common';
import { MongoDBModule } from '@infrastructure/adapters/persistence/mongodb';
import { MarketplaceSeederService } from './marketplace-seeder.service';
import { SeedCommand } from './seed.command';
import { SyncIndexesCommand } from './sync-indexes.command';

/**
 * CLI commands that prepare a database for development and testing.
 */
@Module({
  imports: [MongoDBModule],
  providers: [MarketplaceSeederService, SeedCommand, SyncIndexesCommand],
  exports: [MarketplaceSeederService],
})
export class SeedsModule {}
