import * as z from 'zod/v4';
import { startOfDay } from 'date-fns';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { type CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { type ActivityLogStore } from '../activity/store.js';
import { isActivityLogError } from '../activity/errors.js';
import { formatActivityDate } from '../activity/dates.js';
import {
  filterByWindow,
  resolveWindowStart,
  sortForDisplay,
  summarizeByCategory,
  weeklySeries
} from '../activity/aggregator.js';
import { logger } from '../logger.js';
import { categorySchema, dateSchema, hoursSchema, positionSchema, windowSchema } from '../schemas/common.js';

const log = logger.child('tools');

export interface ToolOptions {
  categories: readonly string[]
  now?: () => Date
}

const json = (value: unknown): CallToolResult => ({ content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] });

const text = (value: string): CallToolResult => ({ content: [{ type: 'text', text: value }] });

/**
 * Store failures become tool errors the model can read; anything else is a bug and propagates.
 */
const guarded = async (tool: string, run: () => Promise<CallToolResult>): Promise<CallToolResult> => {
  try {
    return await run();
  } catch (error) {
    if (!isActivityLogError(error)) throw error;
    log.warn('Tool failed', { tool, code: error.code, error: error.message });
    return { content: [{ type: 'text', text: `${error.code}: ${error.message}` }], isError: true };
  }
};

export const registerTools = (server: McpServer, store: ActivityLogStore, options: ToolOptions): void => {
  const now = options.now ?? (() => new Date());
  const today = (): Date => startOfDay(now());

  // List Activities
  server.registerTool(
    'list-activities',
    {
      title: 'List Activities',
      description: 'All logged activities with their positions (used by delete-activities) and the log revision',
      inputSchema: {
        order: z.enum(['file', 'newest-first']).default('newest-first').describe('Row order; positions are the same either way')
      }
    },
    async ({ order }) => await guarded('list-activities', async () => {
      const { records, revision } = await store.snapshot();
      const rows = order === 'file'
        ? records.map((r, position) => ({ position, ...r }))
        : sortForDisplay(records);
      return json({ revision, records: rows });
    })
  );

  // Add Activity
  server.registerTool(
    'add-activity',
    {
      title: 'Add Activity',
      description: 'Append an activity to the log',
      inputSchema: {
        date: dateSchema.nullish().describe('YYYY-MM-DD (defaults to today)'),
        category: categorySchema(options.categories).describe(`One of: ${options.categories.join(', ')}`),
        hours: hoursSchema.describe('Hours spent, 0.1 to 24')
      }
    },
    async args => await guarded('add-activity', async () => {
      const record = {
        date: args.date ?? formatActivityDate(today()),
        category: args.category,
        hours: args.hours
      };
      const position = await store.append(record);
      return text(`Added ${record.category}: ${record.hours}h on ${record.date} at position ${position}`);
    })
  );

  // Delete Activities
  server.registerTool(
    'delete-activities',
    {
      title: 'Delete Activities',
      description: 'Remove activities by position as returned by list-activities',
      inputSchema: {
        positions: z.array(positionSchema).min(1).describe('Positions to remove'),
        revision: z.string().trim().min(1).nullish().describe('Revision from list-activities; rejects the delete if the log changed since')
      }
    },
    async ({ positions, revision }) => await guarded('delete-activities', async () => {
      const removed = await store.delete(positions, { expectedRevision: revision ?? undefined });
      return json({ deleted: removed.length, records: removed });
    })
  );

  // Summarize Activities
  server.registerTool(
    'summarize-activities',
    {
      title: 'Summarize Activities',
      description: 'Hours per category for a named window or an explicit date range',
      inputSchema: {
        window: windowSchema.default('all-time').describe('Named window; ignored when startDate is given'),
        startDate: dateSchema.nullish().describe('Inclusive start YYYY-MM-DD'),
        endDate: dateSchema.nullish().describe('Inclusive end YYYY-MM-DD (no upper bound when omitted)')
      }
    },
    async args => await guarded('summarize-activities', async () => {
      const records = await store.load();
      const startDate = args.startDate ?? resolveWindowStart(args.window, records, today());
      const endDate = args.endDate ?? undefined;
      const summary = summarizeByCategory(filterByWindow(records, startDate, endDate));
      return json({
        window: args.startDate != null ? null : args.window,
        startDate: startDate ?? null,
        endDate: endDate ?? null,
        ...summary
      });
    })
  );

  // Weekly Trend
  server.registerTool(
    'get-weekly-trend',
    {
      title: 'Weekly Trend',
      description: 'Total hours per week (weeks end on Sunday), oldest first',
      inputSchema: {
        fillGaps: z.boolean().default(false).describe('Emit zero-hour weeks between the first and last active week')
      }
    },
    async ({ fillGaps }) => await guarded('get-weekly-trend', async () => {
      const records = await store.load();
      return json(weeklySeries(records, { fillGaps }));
    })
  );

  // List Categories
  server.registerTool(
    'list-categories',
    {
      title: 'List Categories',
      description: 'Category labels accepted by add-activity'
    },
    async () => json(options.categories)
  );
};
