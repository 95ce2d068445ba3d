export { SeverityScorer } from './severity';
export { OpportunityScorer } from './opportunity';
export type { LeadBucket } from './opportunity';
