export { SeedsModule } from './seeds.module';
export { MarketplaceSeederService, SeedStats } from './marketplace-seeder.service';
export { parseSeedData, SeedData } from './seed-data.schema';
