export { BackgroundTaskRunner } from './background-task-runner';
