export {
  runQueryTool,
  updateDashboardTool,
  resetDashboardTool,
  type ToolOutcome,
  type DashboardUpdate,
  type DashboardUpdateHandler,
} from './tools.js';
export {
  queryToolArgsSchema,
  updateDashboardArgsSchema,
  parseQueryToolArgs,
  parseUpdateDashboardArgs,
  type QueryToolArgs,
  type UpdateDashboardArgs,
} from './schema.js';
export { previewTable, sqlBlock, errorNote } from './markdown.js';
