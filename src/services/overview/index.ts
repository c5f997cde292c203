export { generateOverview } from './overview.generator';
export type { OverviewOptions, OverviewSection } from './overview.generator';
export { parseOverviewResponse } from './overview.parser';
export type { OverviewParseResult } from './overview.parser';
