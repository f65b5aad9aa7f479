/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Render a release time as `yyyy-MM-ddTHH:mm:ss+00:00` in UTC.
 * Milliseconds are dropped; the offset is always written out.
 */
export function formatComposerTime(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    throw new RangeError('Cannot format an invalid date as a release time');
  }
  return (
    `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}` +
    `T${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}+00:00`
  );
}
