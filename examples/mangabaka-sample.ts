/**
 * MangaBaka talker sample script
 *
 * # run: npm run sample -- "One Piece"
 *
 * Reads MANGABAKA_* overrides from a local .env when present.
 */

import 'dotenv/config';
import MangaBakaTalker from '../src';

async function main() {
  const query = process.argv[2] ?? 'One Piece';
  const talker = new MangaBakaTalker({ version: '0.1.0' });
  talker.parseSettings({ mangabaka_age_filter: 'suggestive' });

  console.log('='.repeat(60));
  console.log('MangaBaka talker sample');
  console.log('='.repeat(60));

  // 1. Search for a series
  console.log(`\n[1] Searching for "${query}"...`);
  const results = await talker.searchForSeries(query, {
    callback: (current, total) => console.log(`  ...${current}/${total}`),
    onRateLimit: (wait) => console.log(`  rate limited, waiting ${wait}s`),
  });

  console.log(`Found ${results.length} results:`);
  for (const series of results.slice(0, 5)) {
    console.log(`  - ${series.name} (ID: ${series.id}, ${series.startYear ?? '????'}, ${series.format || 'n/a'})`);
  }

  // 2. Fetch metadata for the best match
  const best = results[0];
  if (best) {
    console.log(`\n[2] Fetching metadata for: ${best.name} (ID: ${best.id})...`);
    const metadata = await talker.fetchComicData({ seriesId: best.id });

    console.log(`Title: ${metadata.series}`);
    console.log(`Publisher: ${metadata.publisher ?? 'n/a'}`);
    console.log(`Rating: ${metadata.criticalRating ?? 'n/a'}`);
    console.log(`Genres: ${metadata.genres.join(', ')}`);
    console.log(`Credits: ${metadata.credits.map((c) => `${c.person} (${c.role})`).join(', ')}`);
  }

  console.log(`\nRequests made: ${talker.getRequestCount()}`);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
