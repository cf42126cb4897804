export {
  OTHER_KEY,
  aggregatePoints,
  aggregateStacks,
  assertTopN,
  collapseStacks,
  groupPoints,
  groupStacks,
  isOtherGroup,
  stackKey,
  topNWithOther,
  type OtherGroup,
  type StackGroup,
  type WeightedGroup,
} from './top-n.js';
export {
  buildStackedSeries,
  countPadding,
  padCategories,
  type SeriesBucket,
  type SeriesEntry,
  type StackedSeries,
} from './padding.js';
export {
  mergeEvents,
  standaloneEvents,
  type Timeline,
  type TimelineEvent,
  type TimelineLink,
} from './event-merge.js';
export {
  buildTree,
  prepareMergedPayload,
  preparePayload,
  truncateStacks,
  type AggregationParams,
  type DisplayPayload,
  type PayloadData,
  type TreeNode,
} from './payload.js';
