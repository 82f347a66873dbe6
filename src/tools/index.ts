export { createSqlTools } from "./sql.js"
export type { SqlQueryChecker, SqlToolOptions } from "./sql.js"
export { maskSql, readOnlySqlGuard, restrictTool } from "./restrict.js"
export type { ToolGuard } from "./restrict.js"
export { createToolset, invokeTool } from "./types.js"
export type { ToolContext, ToolDefinition, ToolOutcome, ToolRisk } from "./types.js"
