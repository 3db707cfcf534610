#!/usr/bin/env node
/**
 * Tracker Store CLI
 * Command-line interface for conversation storage operations
 */

import { Command } from 'commander';

import { CONVERSATION_INDEXES, indexName } from '../core/index-manager.js';
import { classifyEvent } from '../core/types.js';
import type { EventPayload } from '../core/types.js';
import type { TrackerStore } from '../core/tracker-store.js';
import { createBackend, openDefaultTrackerStore, openTrackerStore } from '../services/tracker-service.js';
import { loadStoreConfig, redactMongoUri } from '../core/tracker-config.js';
import { startServer, stopServer } from '../server/index.js';
import { readImportFile } from './import-file.js';

interface GlobalOptions {
  config?: string;
}

const program = new Command();

program
  .name('tracker-store')
  .description('Conversation event log storage CLI')
  .version('1.0.0')
  .option('-c, --config <path>', 'Config file (JSON)');

function configPath(): string | undefined {
  return program.opts<GlobalOptions>().config;
}

/**
 * Open the configured store, run the command, always close the store
 */
async function withStore(label: string, run: (store: TrackerStore) => Promise<void>): Promise<void> {
  let store: TrackerStore | null = null;
  try {
    store = await openDefaultTrackerStore({ configPath: configPath() });
    await run(store);
  } catch (error) {
    console.error(`${label} failed:`, error);
    process.exitCode = 1;
  } finally {
    await store?.close();
  }
}

function describeEvent(event: EventPayload): string {
  const classified = classifyEvent(event);
  switch (classified.kind) {
    case 'user':
      return `👤 ${classified.text ?? ''}`;
    case 'bot':
      return `🤖 ${classified.text ?? ''}`;
    case 'action':
      return `⚙️  ${classified.name ?? '(unnamed)'}`;
    case 'session_started':
      return '🔄 session started';
    case 'other':
      return `📝 ${classified.payload.event}`;
  }
}

/**
 * Keys command
 */
program
  .command('keys')
  .description('List known conversation keys')
  .action(async () => {
    await withStore('Keys', async (store) => {
      const keys = await store.keys();
      console.log(`\n🗂️  Conversations: ${keys.length}\n`);
      for (const key of keys) {
        console.log(`  ${key}`);
      }
    });
  });

/**
 * Show command
 */
program
  .command('show <senderId>')
  .description('Show the stored events of a conversation (current session by default)')
  .option('-f, --full', 'Entire history across sessions')
  .option('--json', 'Print events as JSON')
  .action(async (senderId: string, options: { full?: boolean; json?: boolean }) => {
    await withStore('Show', async (store) => {
      const tracker = options.full
        ? await store.retrieveFull(senderId)
        : await store.retrieve(senderId);

      if (!tracker) {
        console.log(`No conversation stored under "${senderId}"`);
        process.exitCode = 1;
        return;
      }

      if (options.json) {
        console.log(JSON.stringify(tracker.events, null, 2));
        return;
      }

      console.log(`\n📜 ${senderId} (${options.full ? 'full history' : 'current session'})\n`);
      console.log(`Total events: ${tracker.events.length}\n`);
      for (const event of tracker.events) {
        const date = new Date(event.timestamp * 1000).toISOString();
        const line = describeEvent(event);
        console.log(`[${date}] ${line.slice(0, 150)}${line.length > 150 ? '...' : ''}`);
      }
    });
  });

/**
 * Turns command
 */
program
  .command('turns [senderId]')
  .description('List flattened user turns')
  .option('-s, --since <timestamp>', 'Only turns at or after this timestamp (seconds)')
  .option('-l, --limit <number>', 'Number of turns', '20')
  .action(async (senderId: string | undefined, options: { since?: string; limit: string }) => {
    await withStore('Turns', async (store) => {
      const turns = await store.getFlattenedTurns({
        senderId,
        since: options.since !== undefined ? parseFloat(options.since) : undefined,
        limit: parseInt(options.limit, 10)
      });

      console.log(`\n💬 Flattened turns: ${turns.length}\n`);
      for (const turn of turns) {
        const date = turn.timestamp !== null ? new Date(turn.timestamp * 1000).toISOString() : 'unknown time';
        const confidence = turn.intentConfidence !== null ? turn.intentConfidence.toFixed(2) : '-';
        console.log(`---`);
        console.log(`📌 ${turn.conversationKey} [${date}]`);
        console.log(`   Input: ${turn.userInput ?? ''}`);
        console.log(`   Intent: ${turn.intentName ?? '-'} (${confidence})`);
        console.log(`   Actions: ${turn.actionNames.map((name) => name ?? '(unnamed)').join(', ') || '-'}`);
        console.log(`   Bot: ${turn.botResponses.map((r) => r.text ?? '').join(' | ') || '-'}`);
      }
    });
  });

/**
 * Import command
 */
program
  .command('import <file>')
  .description('Save conversations from a JSON file ({ sender_id, events } or an array of them)')
  .action(async (file: string) => {
    await withStore('Import', async (store) => {
      const trackers = readImportFile(file);
      let appended = 0;

      for (const tracker of trackers) {
        const result = await store.save(tracker);
        appended += result.appended.length;
        console.log(`📥 ${tracker.senderId}: ${result.appended.length} new events (${result.persistedBefore} already stored)`);
      }

      console.log(`\n✅ Imported ${appended} events across ${trackers.length} conversations`);
    });
  });

/**
 * Indexes command
 */
program
  .command('indexes')
  .description('Create the query indexes of the conversations collection')
  .action(async () => {
    const config = loadStoreConfig({ configPath: configPath() });
    const backend = createBackend(config);

    try {
      await backend.connect();
      await backend.ensureIndexes(CONVERSATION_INDEXES);
      console.log('✅ Indexes ensured:');
      for (const index of CONVERSATION_INDEXES) {
        console.log(`  ${indexName(index)}`);
      }
    } catch (error) {
      console.error('Indexes failed:', error);
      process.exitCode = 1;
    } finally {
      await backend.close();
    }
  });

/**
 * Stats command
 */
program
  .command('stats')
  .description('View storage statistics')
  .action(async () => {
    await withStore('Stats', async (store) => {
      const stats = await store.getStats();

      console.log('\n📊 Tracker Store Statistics\n');
      console.log(`Backend: ${store.backendKind}`);
      console.log(`Conversations: ${stats.conversations}`);
      console.log(`Events: ${stats.events}`);
      console.log(`Flattened turns: ${stats.flattenedTurns}`);
    });
  });

/**
 * Serve command
 */
program
  .command('serve')
  .description('Start the HTTP API')
  .option('-H, --host <host>', 'Bind address')
  .option('-p, --port <number>', 'Port')
  .action(async (options: { host?: string; port?: string }) => {
    try {
      const config = loadStoreConfig({ configPath: configPath() });
      if (config.backend === 'mongo') {
        console.log(`Connecting to ${redactMongoUri(config.mongo.uri)} (db=${config.mongo.dbName})`);
      }

      const store = await openTrackerStore(config);
      startServer(store, {
        host: options.host ?? config.server.host,
        port: options.port !== undefined ? parseInt(options.port, 10) : config.server.port
      });

      const shutdown = (): void => {
        stopServer()
          .then(() => store.close())
          .catch((error: unknown) => {
            console.error('Shutdown failed:', error);
            process.exitCode = 1;
          });
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    } catch (error) {
      console.error('Serve failed:', error);
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
