import { resolve } from 'path';
import { Command, CommandRunner, Option } from 'nest-commander';
import { MarketplaceSeederService } from './marketplace-seeder.service';

export const DEFAULT_SEED_FILE = 'data/seed-data.json';

interface SeedCommandOptions {
  clear?: boolean;
  stats?: boolean;
  file?: string;
}

@Command({
  name: 'seed',
  description: 'Seed the database with starter users, courses, slots and promo codes',
})
export class SeedCommand extends CommandRunner {
  constructor(private readonly seederService: MarketplaceSeederService) {
    super();
  }

  async run(_passedParams: string[], options: SeedCommandOptions): Promise<void> {
    if (options.stats) {
      const stats = await this.seederService.getStats();
      /* eslint-disable no-console */
      console.log('\n📊 Current Database Stats:');
      for (const [collection, count] of Object.entries(stats.collections)) {
        console.log(`   ${collection}: ${count}`);
      }
      /* eslint-enable no-console */
      return;
    }

    const data = await this.seederService.loadFile(
      resolve(process.cwd(), options.file ?? DEFAULT_SEED_FILE),
    );

    if (options.clear) {
      await this.seederService.clear();
    }
    await this.seederService.seed(data);

    // eslint-disable-next-line no-console
    console.log('\n✅ Seed completed successfully!');
  }

  @Option({
    flags: '-c, --clear',
    description: 'Clear existing data before seeding',
  })
  parseClear(): boolean {
    return true;
  }

  @Option({
    flags: '-s, --stats',
    description: 'Show current database statistics',
  })
  parseStats(): boolean {
    return true;
  }

  @Option({
    flags: '-f, --file <path>',
    description: `Seed data file (default: ${DEFAULT_SEED_FILE})`,
  })
  parseFile(value: string): string {
    return value;
  }
}
