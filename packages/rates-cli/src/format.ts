import type {
  CommandResponse,
  HistoryView,
  RateDescription,
  RateList,
  SchedulerStatusView,
  UpdateResultView
} from './responses.js';

const groupedTwoDecimals = new Intl.NumberFormat('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });

/** Precision follows magnitude so sub-cent crypto crosses stay readable. */
export function formatRate(rate: number): string {
  if (rate < 0.01) {
    return rate.toFixed(8);
  }
  if (rate < 1) {
    return rate.toFixed(6);
  }
  if (rate < 1000) {
    return rate.toFixed(4);
  }
  return groupedTwoDecimals.format(rate);
}

export function formatRateList(list: RateList): string {
  if (list.rates.length === 0) {
    return 'No rates cached. Run `rates-cli update-rates` first.';
  }

  const lines = [`Rates against ${list.baseCurrency}, last refresh ${list.lastRefresh ?? 'never'}`];
  for (const view of list.rates) {
    const stale = view.fresh ? '' : '  (stale)';
    lines.push(`  ${view.pair.padEnd(10)} ${formatRate(view.rate).padStart(18)}  ${view.source}${stale}`);
  }
  return lines.join('\n');
}

export function formatRateDescription(description: RateDescription): string {
  const lines = [
    `1 ${description.from} = ${formatRate(description.rate)} ${description.to}`,
    `1 ${description.to} = ${formatRate(description.reverseRate)} ${description.from}`,
    `Source: ${description.source} (${description.via}), updated ${description.updatedAt} (${description.ageSeconds}s ago)`
  ];

  if (!description.fresh) {
    lines.push(
      `Rate is stale (older than ${description.ttlSeconds}s). Run \`rates-cli update-rates\` to refresh.`
    );
  }
  return lines.join('\n');
}

export function formatUpdateResult(result: UpdateResultView): string {
  const lines = result.success
    ? [`Update succeeded in ${result.elapsedMs}ms (run ${result.runId})`]
    : [`Update failed: ${result.error?.code ?? 'UNKNOWN'}: ${result.error?.message ?? 'no details'}`];

  for (const currencyClass of ['fiat', 'crypto'] as const) {
    const counts = result.counts[currencyClass];
    lines.push(`  ${currencyClass}: fetched ${counts.fetched}, saved ${counts.saved}, rejected ${counts.rejected}`);
  }

  for (const outcome of result.sources) {
    lines.push(
      outcome.ok
        ? `  ${outcome.source}: ok, ${outcome.fetched} rates, ${outcome.attempts} attempt(s)`
        : `  ${outcome.source}: failed ${outcome.error?.code ?? 'UNKNOWN'} after ${outcome.attempts} attempt(s)`
    );
  }
  return lines.join('\n');
}

export function formatHistory(history: HistoryView): string {
  if (history.entries.length === 0) {
    return 'No history entries.';
  }

  return history.entries
    .map((entry) => `${entry.timestamp}  ${`${entry.from}_${entry.to}`.padEnd(10)} ${formatRate(entry.rate).padStart(18)}  ${entry.source}`)
    .join('\n');
}

export function formatSchedulerStatus(status: SchedulerStatusView): string {
  return [
    `Scheduler ${status.running ? 'running' : 'stopped'}${status.inFlight ? ' (run in flight)' : ''}`,
    `  interval: ${Math.round(status.intervalMs / 1000)}s, ttl: ${status.ttlSeconds}s`,
    `  runs: ${status.scheduledRuns} scheduled, ${status.successfulRuns} succeeded, ${status.failedRuns} failed`,
    `  last run: ${status.lastRunAt ?? 'never'}, last success: ${status.lastSuccessAt ?? 'never'}`,
    `  next run: ${status.nextRunAt ?? 'not scheduled'}`
  ].join('\n');
}

export function renderResponse(response: CommandResponse): string {
  switch (response.kind) {
    case 'show-rates':
      return formatRateList(response.body);
    case 'get-rate':
      return formatRateDescription(response.body);
    case 'history':
      return formatHistory(response.body);
    case 'scheduler-status':
      return formatSchedulerStatus(response.body);
    case 'update-rates':
      return formatUpdateResult(response.body);
  }
}
