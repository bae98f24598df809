import type { TimeReporter } from "./TimeReporter";
import { TimeReporterBuilder } from "./TimeReporterBuilder";

export type ReporterSource = TimeReporter | TimeReporterBuilder;

function resolve(source: ReporterSource): TimeReporter {
  return source instanceof TimeReporterBuilder ? source.build() : source;
}

/**
 * Runs `work` with a reporter and finishes it on the way out, whether `work`
 * returns or throws.
 */
export function withTimeReport<R>(source: ReporterSource, work: (reporter: TimeReporter) => R): R {
  const reporter = resolve(source);
  try {
    return work(reporter);
  } finally {
    reporter.finish();
  }
}

/** Like `withTimeReport`, finishing once the returned promise settles. */
export async function withTimeReportAsync<R>(
  source: ReporterSource,
  work: (reporter: TimeReporter) => Promise<R>
): Promise<R> {
  const reporter = resolve(source);
  try {
    return await work(reporter);
  } finally {
    reporter.finish();
  }
}
