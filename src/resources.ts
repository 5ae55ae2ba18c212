import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import * as z from 'zod/v4';
import { startOfDay } from 'date-fns';
import { type ActivityLogStore } from './activity/store.js';
import { type ActivityRecord, NAMED_WINDOWS } from './activity/types.js';
import {
  filterByWindow,
  resolveWindowStart,
  sortForDisplay,
  summarizeByCategory,
  weeklySeries
} from './activity/aggregator.js';
import { type ToolOptions } from './tools/index.js';

const WINDOW_LABELS: Record<typeof NAMED_WINDOWS[number], string> = {
  'last-7-days': 'Last 7 days',
  'last-30-days': 'Last 30 days',
  'last-5-months': 'Last 5 months',
  'all-time': 'All time'
};

const hoursLabel = (hours: number): string => `${hours.toFixed(1)}h`;

/**
 * Plain-text overview: a total per named window, the top categories of the
 * whole log and the most recent week.
 */
export const buildOverview = (records: ActivityRecord[], today: Date): string => {
  if (records.length === 0) {
    return 'No activities logged yet. Use the add-activity tool to record one.';
  }

  const lines = NAMED_WINDOWS.map(window => {
    const summary = summarizeByCategory(filterByWindow(records, resolveWindowStart(window, records, today)));
    return `${WINDOW_LABELS[window]}: ${hoursLabel(summary.total)}`;
  });

  const allTime = summarizeByCategory(records);
  if (allTime.kind === 'totals') {
    const top = [...allTime.categories]
      .sort((a, b) => b.hours - a.hours)
      .slice(0, 3)
      .map(c => `${c.category} ${hoursLabel(c.hours)} (${(c.share * 100).toFixed(1)}%)`);
    lines.push(`Top categories: ${top.join('; ')}`);
  }

  const weeks = weeklySeries(records);
  const latest = weeks[weeks.length - 1];
  if (latest !== undefined) {
    lines.push(`Latest active week ending ${latest.weekEnding}: ${hoursLabel(latest.hours)}`);
  }
  return lines.join('\n');
};

/**
 * Registers read-only MCP resources and reusable prompt templates.
 */
export const registerResourcesAndPrompts = (server: McpServer, store: ActivityLogStore, options: ToolOptions): void => {
  const now = options.now ?? (() => new Date());

  // Raw log, newest first
  server.registerResource(
    'activity-log',
    'activity://log',
    { mimeType: 'application/json', description: 'Every logged activity, newest first, with load positions' },
    async () => {
      const records = await store.load();
      return {
        contents: [
          {
            uri: 'activity://log',
            mimeType: 'application/json',
            text: JSON.stringify(sortForDisplay(records), null, 2)
          }
        ]
      };
    }
  );

  // Category labels
  server.registerResource(
    'categories',
    'activity://categories',
    { mimeType: 'application/json', description: 'Category labels accepted by add-activity' },
    async () => ({
      contents: [
        {
          uri: 'activity://categories',
          mimeType: 'application/json',
          text: JSON.stringify(options.categories, null, 2)
        }
      ]
    })
  );

  // Overview report
  server.registerResource(
    'overview',
    'activity://overview',
    { mimeType: 'text/plain', description: 'Totals per time window, top categories and the latest week' },
    async () => {
      const records = await store.load();
      return {
        contents: [
          {
            uri: 'activity://overview',
            mimeType: 'text/plain',
            text: buildOverview(records, startOfDay(now()))
          }
        ]
      };
    }
  );

  // Prompt: Weekly review
  server.registerPrompt(
    'weekly-review',
    {
      description: 'Review how time was spent recently and suggest adjustments.',
      argsSchema: {
        window: z.enum(NAMED_WINDOWS).nullish().describe('Window to focus on (defaults to last-7-days)')
      }
    },
    async ({ window }) => {
      const focus = window ?? 'last-7-days';
      return {
        messages: [
          {
            role: 'user' as const,
            content: {
              type: 'text' as const,
              text: [
                `Review my logged activity for the window "${focus}".`,
                'Hours are decimal (1.5 = one and a half hours).',
                'Use these resources and tools as needed:',
                '- Resource activity://overview for totals across windows.',
                `- Tool summarize-activities with window "${focus}" for the category breakdown.`,
                '- Tool get-weekly-trend to compare against earlier weeks.',
                'Point out neglected categories and keep the advice short.'
              ].join('\n')
            }
          }
        ]
      } satisfies { messages: Array<{ role: 'user', content: { type: 'text', text: string } }> };
    }
  );

  // Prompt: Log activity
  server.registerPrompt(
    'log-activity',
    {
      description: 'Turn a free-form description of work into add-activity calls.',
      argsSchema: {
        description: z.string().describe('What was done, e.g. "2h on interview prep yesterday"')
      }
    },
    async ({ description }) => {
      return {
        messages: [
          {
            role: 'user' as const,
            content: {
              type: 'text' as const,
              text: [
                'Record the following as activity log entries:',
                description,
                `Allowed categories: ${options.categories.join(', ')}.`,
                'Dates are YYYY-MM-DD; hours must be between 0.1 and 24 per entry.',
                'Call add-activity once per entry, then confirm what was recorded.'
              ].join('\n')
            }
          }
        ]
      } satisfies { messages: Array<{ role: 'user', content: { type: 'text', text: string } }> };
    }
  );
};
