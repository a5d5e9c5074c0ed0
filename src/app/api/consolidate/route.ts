import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { consolidatorConfigSchema, createConsoleLogger, ExcelConsolidator, isConsolidatorError } from '@/lib/excel-utils';
import type { ProgressEvent } from '@/lib/excel-utils';

const consolidateRequestSchema = z.object({
  config: consolidatorConfigSchema,
  estimateFiles: z.array(z.string()).min(1, 'Please add at least one estimate spreadsheet.'),
});

/**
 * Runs the full validation and consolidation for the posted configuration and estimate files.
 * Responds with the output path and the progress events of the run.
 */
export async function POST(request: NextRequest) {
  let body: z.infer<typeof consolidateRequestSchema>;
  try {
    const parsed = consolidateRequestSchema.safeParse(await request.json());
    if (!parsed.success) {
      return NextResponse.json({ error: parsed.error.issues[0]?.message ?? 'Invalid request.' }, { status: 400 });
    }
    body = parsed.data;
  } catch {
    return NextResponse.json({ error: 'Request body must be JSON.' }, { status: 400 });
  }

  const events: ProgressEvent[] = [];
  const logger = createConsoleLogger('consolidate');
  try {
    const consolidator = await ExcelConsolidator.create(body.config, { logger });
    const outputPath = await consolidator.consolidate(body.estimateFiles, event => events.push(event));
    return NextResponse.json({ outputPath, events });
  } catch (error) {
    if (isConsolidatorError(error) && error.kind !== 'runtime') {
      return NextResponse.json({ error: error.message, code: error.code }, { status: 400 });
    }
    logger.error('Consolidation request failed', error);
    const message = isConsolidatorError(error) ? error.message : 'Consolidation failed.';
    return NextResponse.json({ error: message }, { status: 500 });
  }
}
