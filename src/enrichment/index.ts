export { HeadlineEnricher } from './headline-enricher';
export type { HeadlineEnricherOptions } from './headline-enricher';
