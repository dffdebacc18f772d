import { PipelineError, RankedReport } from './types';

const SEPARATOR = '====================================';

export interface ReportFormatOptions {
  /** IANA zone used to render the window time, e.g. "UTC" or "Asia/Shanghai" */
  timeZone: string;
}

const formatters: Map<string, Intl.DateTimeFormat> = new Map();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    try {
      formatter = new Intl.DateTimeFormat('en-US', {
        timeZone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
        hour: '2-digit',
        minute: '2-digit',
        second: '2-digit',
        hourCycle: 'h23'
      });
    } catch (error) {
      throw new PipelineError(`Unknown time zone: ${timeZone}`, 'INVALID_CONFIG', {
        timeZone,
        error: error instanceof Error ? error.message : String(error)
      });
    }
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

export function assertTimeZone(timeZone: string): void {
  getFormatter(timeZone);
}

/**
 * Renders epoch seconds as "yyyy年MM月dd日 HH时 mm分 ss秒" in the given zone.
 */
export function formatReportTime(epochSeconds: number, timeZone: string): string {
  const parts: Record<string, string> = {};
  for (const part of getFormatter(timeZone).formatToParts(new Date(epochSeconds * 1000))) {
    parts[part.type] = part.value;
  }

  const year = parts.year.padStart(4, '0');
  return `${year}年${parts.month}月${parts.day}日 ${parts.hour}时 ${parts.minute}分 ${parts.second}秒`;
}

/**
 * Text form of a report. The time line shows the last second inside the window,
 * ranks start at 0, and the text ends with a blank line.
 */
export function formatReport(report: RankedReport, options: ReportFormatOptions): string {
  let text = `${SEPARATOR}\n`;
  text += `时间: ${formatReportTime(report.windowEnd - 1, options.timeZone)}\n`;

  report.entries.forEach((entry, rank) => {
    text += `No${rank}:  请求URL=${entry.requestPath}  请求量=${entry.count}\n`;
  });

  text += `${SEPARATOR}\n\n`;
  return text;
}
