/**
 * Application Entry Point
 *
 * Boots the view layer from configuration and renders the index page.
 */

import { loadConfig } from './framework/config/mod.ts';
import { Logger, setLogger } from './framework/telemetry/mod.ts';
import { View } from './framework/view/mod.ts';

async function main(): Promise<void> {
  // 1. Load configuration
  const config = await loadConfig();

  // 2. Logger at the configured level
  const logger = new Logger({
    level: config.logLevel(),
    format: config.get<string>('env') === 'production' ? 'json' : 'pretty',
  });
  setLogger(logger);

  // 3. Views
  const view = View.fromConfig(config, logger);
  await view.load();

  // 4. Render
  const page = view.render('index', {
    title: 'Recent posts',
    posts: [
      { title: 'Partials', author: 'ada', tags: ['views'] },
      { title: 'Layouts', author: 'grace', tags: ['views', 'layouts'] },
    ],
  });
  process.stdout.write(page);
}

main().catch((error: unknown) => {
  const err = error instanceof Error ? error : new Error(String(error));
  new Logger({ format: 'pretty' }).error('Failed to render', err);
  process.exitCode = 1;
});
