export type { JobSnapshot, JobStatusProvider, KnownJobStatus, TerminalJobStatus } from './job-status-provider.js'
export { isTerminalJobStatus } from './job-status-provider.js'
