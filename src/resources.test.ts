import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { ActivityLogStore } from './activity/store.js';
import { createMcpServer } from './app.js';
import { buildOverview } from './resources.js';

const records = [
  { date: '2024-01-01', category: 'A', hours: 2 },
  { date: '2024-01-03', category: 'A', hours: 1 },
  { date: '2024-01-10', category: 'B', hours: 3 }
];

describe('buildOverview', () => {
  it('reports totals per window, top categories and the latest week', () => {
    expect(buildOverview(records, new Date(2024, 0, 12))).toBe([
      'Last 7 days: 3.0h',
      'Last 30 days: 6.0h',
      'Last 5 months: 6.0h',
      'All time: 6.0h',
      'Top categories: A 3.0h (50.0%); B 3.0h (50.0%)',
      'Latest active week ending 2024-01-14: 3.0h'
    ].join('\n'));
  });

  it('explains an empty log', () => {
    expect(buildOverview([], new Date(2024, 0, 12))).toBe('No activities logged yet. Use the add-activity tool to record one.');
  });
});

describe('activity resources', () => {
  let dir: string;
  let client: Client;

  const readText = async (uri: string): Promise<string> => {
    const { contents } = await client.readResource({ uri });
    const first = contents[0];
    if (first === undefined || !('text' in first) || typeof first.text !== 'string') {
      throw new Error(`Resource ${uri} returned no text`);
    }
    return first.text;
  };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'activity-resources-'));
    const filePath = join(dir, 'activity_log.csv');
    await writeFile(filePath, 'Date,Category,Hours\n2024-01-01,A,2\n2024-01-10,B,3\n');

    const server = createMcpServer(new ActivityLogStore({ filePath }), {
      categories: ['A', 'B'],
      now: () => new Date(2024, 0, 12)
    });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    client = new Client({ name: 'activity-resources-test', version: '0.0.0' });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await rm(dir, { recursive: true, force: true });
  });

  it('serves the raw log newest first', async () => {
    expect(JSON.parse(await readText('activity://log'))).toEqual([
      { date: '2024-01-10', category: 'B', hours: 3, position: 1 },
      { date: '2024-01-01', category: 'A', hours: 2, position: 0 }
    ]);
  });

  it('serves the category labels', async () => {
    expect(JSON.parse(await readText('activity://categories'))).toEqual(['A', 'B']);
  });

  it('serves the overview', async () => {
    expect(await readText('activity://overview')).toBe([
      'Last 7 days: 3.0h',
      'Last 30 days: 5.0h',
      'Last 5 months: 5.0h',
      'All time: 5.0h',
      'Top categories: B 3.0h (60.0%); A 2.0h (40.0%)',
      'Latest active week ending 2024-01-14: 3.0h'
    ].join('\n'));
  });

  it('fills the weekly-review prompt with the requested window', async () => {
    const prompt = await client.getPrompt({ name: 'weekly-review', arguments: { window: 'last-30-days' } });
    const first = prompt.messages[0];
    expect(first?.content.type).toBe('text');
    expect(first?.content.type === 'text' ? first.content.text.split('\n')[0] : '').toBe(
      'Review my logged activity for the window "last-30-days".'
    );
  });

  it('lists the configured categories in the log-activity prompt', async () => {
    const prompt = await client.getPrompt({ name: 'log-activity', arguments: { description: '2h on B yesterday' } });
    const first = prompt.messages[0];
    expect(first?.content.type === 'text' ? first.content.text.split('\n') : []).toEqual([
      'Record the following as activity log entries:',
      '2h on B yesterday',
      'Allowed categories: A, B.',
      'Dates are YYYY-MM-DD; hours must be between 0.1 and 24 per entry.',
      'Call add-activity once per entry, then confirm what was recorded.'
    ]);
  });
});
