import pino from 'pino';

// stdout carries the MCP protocol, so logs go to stderr.
export const logger = pino(
  {
    name: 'mutmut-mcp',
    level: process.env.MUTMUT_MCP_LOG_LEVEL ?? process.env.LOG_LEVEL ?? 'info',
  },
  pino.destination(2),
);
