/**
 * Application settings document
 *
 * A flat JSON object of preferences. Keys missing from the file take
 * their defaults; unknown keys are dropped on load.
 */

import { z } from 'zod';

export const SendKeyModeSchema = z.enum(['shiftEnter', 'ctrlEnter', 'enter']);
export type SendKeyMode = z.infer<typeof SendKeyModeSchema>;

export const AppSettingsSchema = z.object({
  sendKeyMode: SendKeyModeSchema.default('shiftEnter'),
  fontFamily: z.string().default('Segoe UI'),
  fontSize: z.number().int().positive().default(14),
  alwaysOnTop: z.boolean().default(false),

  snippetsPanelVisible: z.boolean().default(true),
  snippetsPanelWidth: z.number().positive().default(280),

  // Window geometry (-1 = let the window manager place it)
  windowWidth: z.number().positive().default(1200),
  windowHeight: z.number().positive().default(700),
  windowLeft: z.number().default(-1),
  windowTop: z.number().default(-1),
  isMaximized: z.boolean().default(false),

  textAreaWidth: z.number().int().positive().default(800),
  textAreaHeight: z.number().positive().default(100),
  textAreaFontFamily: z.string().default('Segoe UI'),
  textAreaFontSize: z.number().int().positive().default(14),

  /** Explicit snippet file; empty means resolve automatically */
  snippetsFilePath: z.string().default(''),
  snippetSortMode: z.enum(['custom', 'title', 'dateCreated']).default('custom'),
  snippetSortDirection: z.enum(['ascending', 'descending']).default('ascending'),
});

export type AppSettings = z.infer<typeof AppSettingsSchema>;

export const DEFAULT_SETTINGS: Readonly<AppSettings> = Object.freeze(AppSettingsSchema.parse({}));
