export type LogFilter = (topic: string) => boolean;

let filter: LogFilter = () => false;

export default function log(topic: string, ...args: unknown[]): void {
  if (filter(topic)) console.debug(new Date(), topic, ...args);
}

/** Enables debug output for the topics the predicate accepts (all off by default). */
export function setLogFilter(newFilter: LogFilter): void {
  filter = newFilter;
}
