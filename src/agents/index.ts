/**
 * Agents Module
 */

export { createAgent, type AgentHandler } from './function-agent.js';
