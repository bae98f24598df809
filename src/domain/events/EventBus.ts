export interface Subscription {
  unsubscribe(): void;
}

export interface EventBus {
  publish<T>(topic: string, payload: T): void;
  subscribe<T>(topic: string, handler: (payload: T) => void): Subscription;
}

export const Topics = {
  TimeReportEmitted: "time-report.emitted",
} as const;
