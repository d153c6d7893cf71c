import express from 'express';
import cookieParser from 'cookie-parser';
import { config } from './config.js';
import { getAgentDeps } from './dispatcher.js';
import agentRoutes from './routes/agent.js';

const app = express();
app.use(express.json());
app.use(cookieParser());

// routes
app.use('/agent', agentRoutes);

const { graph, llm } = getAgentDeps();
const schema = graph.schema();
console.log(`[Graph] ${schema.nodeTypes.length} node types, ${schema.relationshipTypes.length} relationship types`);
for (const { type, count } of schema.nodeCounts.slice(0, 3)) console.log(`[Graph]   ${type}: ${count} nodes`);

const health = await llm.healthCheck();
console.log(`[LLM] ${health.message}`);

app.listen(config.port, () => console.log(`Listening on port ${config.port}`));
