/**
 * Basic Usage Example
 *
 * Creates a gateway client for the task service and runs a few calls
 * through the typed API.
 *
 *   TASK_SERVICE_URL=http://localhost:20253 npx tsx examples/basic-usage.ts
 */

import {
  GatewayClient,
  InvalidIdentifierError,
  TaskServiceApi,
  createGatewayLogger,
  loadGatewayConfigFromEnv,
} from '../src/index.js';

const logger = createGatewayLogger({ name: 'task-gateway-example', level: 'debug' });

async function main() {
  const gateway = new GatewayClient({
    ...loadGatewayConfigFromEnv(),
    logger,
    // Fail fast when the service is not running locally
    maxRetries: 1,
    retryDelaysMs: [200],
  });

  gateway.on('healthy', () => logger.info({}, 'Task service is healthy'));
  gateway.on('unhealthy', () => logger.warn({}, 'Task service is unhealthy'));

  const tasks = new TaskServiceApi(gateway);
  const userId = '3f2b8c1e-6d4a-4b7f-9e21-5c8d0a7b4e13';

  try {
    const healthy = await gateway.checkHealth();
    console.log('Healthy:', healthy);

    const created = await tasks.createTask(userId, { title: 'Write the report', priority: 'HIGH' });
    console.log('Created:', created);

    // POST tasks/query is sent upstream as GET tasks/?status=pending&user_id=...
    const pending = await tasks.queryTasks(userId, { status: 'pending', limit: 10 });
    console.log('Pending:', JSON.stringify(pending.data, null, 2));

    // Rejected before any request is made
    await tasks.getTask(userId, 'not-a-uuid');
  } catch (error) {
    if (error instanceof InvalidIdentifierError) {
      console.error(`Rejected ${error.field}: ${error.value}`);
    } else {
      throw error;
    }
  } finally {
    console.log('Metrics:', gateway.getMetrics());
    gateway.close();
  }
}

// Run if executed directly
main().catch(console.error);
