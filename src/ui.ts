import chalk from 'chalk';
import { type Series, type SeriesCandidate, seriesYear } from './types.js';

export const success = (msg: string) => chalk.green(msg);
export const info = (msg: string) => chalk.cyan(msg);
export const warning = (msg: string) => chalk.yellow(msg);
export const error = (msg: string) => chalk.red(msg);

function truncate(s: string, max: number) {
  return s.length > max ? `${s.slice(0, max - 3)}...` : s;
}

/** Numbered list of candidates, one line each: "1. Name (Year) - overview" */
export function formatSearchResults(results: readonly SeriesCandidate[]): string[] {
  return results.map((r, i) => {
    const year = seriesYear(r);
    const title = `${r.name}${year ? ` (${year})` : ''}`;
    const overview = r.overview ? chalk.gray(` - ${truncate(r.overview, 80)}`) : '';
    return `${chalk.bold(`${i + 1}.`)} ${title}${overview}`;
  });
}

export function formatSeriesInfo(series: Series): string[] {
  const lines = [chalk.bold(`${series.name}${seriesYear(series) ? ` (${seriesYear(series)})` : ''}`)];
  if (series.originalName && series.originalName !== series.name) lines.push(`${chalk.gray('Original name:')} ${series.originalName}`);
  if (series.status) lines.push(`${chalk.gray('Status:')} ${series.status}`);
  if (series.networks.length) lines.push(`${chalk.gray('Network:')} ${series.networks.join(', ')}`);
  if (series.genres.length) lines.push(`${chalk.gray('Genres:')} ${series.genres.join(', ')}`);
  if (series.voteAverage !== undefined) lines.push(`${chalk.gray('Rating:')} ${series.voteAverage}`);
  if (series.overview) lines.push(`${chalk.gray('Overview:')} ${truncate(series.overview, 300)}`);
  return lines;
}
