export { TriageWorkflow } from './TriageWorkflow.js';
export type { TriageWorkflowOptions } from './TriageWorkflow.js';
export type {
  AlertSummary,
  AssessResponse,
  FollowUpResponse,
  TriageResultView,
  WorkflowIssue,
} from './types.js';
