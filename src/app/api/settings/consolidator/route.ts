import { NextRequest, NextResponse } from 'next/server';
import { ZodError } from 'zod';
import {
  consolidatorSettingsSchema,
  type ConsolidatorSettings,
  getSettingsFilePath,
  readConsolidatorSettings,
  writeConsolidatorSettings,
} from '@/lib/consolidator-settings';

/**
 * Handles GET requests to retrieve the consolidator settings.
 */
export async function GET() {
  try {
    const settings = await readConsolidatorSettings(getSettingsFilePath());
    // No saved settings yet: the client falls back to its defaults.
    return NextResponse.json(settings ?? {});
  } catch (error) {
    console.error('Failed to read settings:', error);
    return NextResponse.json({ error: 'Failed to read settings file.' }, { status: 500 });
  }
}

/**
 * Handles POST requests to save the consolidator settings.
 */
export async function POST(request: NextRequest) {
  let settings: ConsolidatorSettings;
  try {
    settings = consolidatorSettingsSchema.parse(await request.json());
  } catch (error) {
    const message = error instanceof ZodError ? error.issues[0]?.message ?? 'Invalid settings.' : 'Request body must be JSON.';
    return NextResponse.json({ error: message }, { status: 400 });
  }

  try {
    await writeConsolidatorSettings(getSettingsFilePath(), settings);
    return NextResponse.json({ message: 'Settings saved successfully.' });
  } catch (error) {
    console.error('Failed to save settings:', error);
    return NextResponse.json({ error: 'Failed to save settings file.' }, { status: 500 });
  }
}
