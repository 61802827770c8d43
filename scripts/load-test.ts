/**
 * Load testing script for the convert and redirect services
 * Run with: npm run load-test
 */

import { formatStats, TestResult } from './load-stats';

const WRITE_URL = process.env.WRITE_URL || 'http://localhost:8080';
const READ_URL = process.env.READ_URL || WRITE_URL;
const TOTAL_REQUESTS = parseInt(process.env.REQUESTS || '100', 10);
const CONCURRENCY = parseInt(process.env.CONCURRENCY || '10', 10);

const results: TestResult[] = [];

async function makeRequest(
  operation: string,
  url: string,
  method: string,
  body?: object
): Promise<{ result: TestResult; response?: Response }> {
  const start = performance.now();

  try {
    const response = await fetch(url, {
      method,
      headers: body ? { 'Content-Type': 'application/json' } : undefined,
      body: body ? JSON.stringify(body) : undefined,
      redirect: 'manual',
    });

    const duration = performance.now() - start;
    return {
      result: { operation, success: response.status < 400, duration, statusCode: response.status },
      response,
    };
  } catch {
    const duration = performance.now() - start;
    return { result: { operation, success: false, duration } };
  }
}

async function readShortCode(response: Response): Promise<string | null> {
  const data: unknown = await response.json();
  if (typeof data === 'object' && data !== null && 'shortCode' in data) {
    return typeof data.shortCode === 'string' ? data.shortCode : null;
  }
  return null;
}

async function runBatch(batchSize: number, offset: number): Promise<string[]> {
  const codes: string[] = [];
  const promises: Promise<void>[] = [];

  for (let i = 0; i < batchSize; i++) {
    const promise = (async () => {
      const create = await makeRequest('CREATE', `${WRITE_URL}/api/v1/urls`, 'POST', {
        originalUrl: `https://example.com/load/${Date.now()}/${offset + i}`,
      });
      results.push(create.result);

      if (create.result.statusCode !== 201 || !create.response) {
        return;
      }
      const shortCode = await readShortCode(create.response);
      if (!shortCode) {
        return;
      }
      codes.push(shortCode);

      // First read misses the cache, second should hit it
      const cold = await makeRequest('REDIRECT_MISS', `${READ_URL}/${shortCode}`, 'GET');
      results.push(cold.result);
      const warm = await makeRequest('REDIRECT_HIT', `${READ_URL}/${shortCode}`, 'GET');
      results.push(warm.result);

      const lookup = await makeRequest('LOOKUP', `${READ_URL}/api/v1/urls/${shortCode}`, 'GET');
      results.push(lookup.result);
    })();
    promises.push(promise);
  }

  await Promise.all(promises);
  return codes;
}

function printStats(): void {
  for (const line of formatStats(results)) {
    console.log(line);
  }
}

async function main(): Promise<void> {
  console.log('URL Shortener Load Test');
  console.log(`Write URL: ${WRITE_URL}`);
  console.log(`Read URL:  ${READ_URL}`);
  console.log(`Total Requests: ${TOTAL_REQUESTS}`);
  console.log(`Concurrency: ${CONCURRENCY}`);
  console.log('');

  // Health check
  console.log('Checking server health...');
  const health = await makeRequest('HEALTH', `${WRITE_URL}/api/health`, 'GET');
  if (!health.result.success) {
    console.error('Server is not healthy. Aborting.');
    process.exit(1);
  }
  console.log('Server is healthy. Starting load test...\n');

  const startTime = performance.now();
  const batches = Math.ceil(TOTAL_REQUESTS / CONCURRENCY);
  let allCodes: string[] = [];

  for (let i = 0; i < batches; i++) {
    const batchSize = Math.min(CONCURRENCY, TOTAL_REQUESTS - i * CONCURRENCY);
    process.stdout.write(`\rBatch ${i + 1}/${batches} (${batchSize} concurrent)...`);
    const codes = await runBatch(batchSize, i * CONCURRENCY);
    allCodes = allCodes.concat(codes);
  }

  const totalTime = performance.now() - startTime;
  console.log(`\n\nCompleted in ${(totalTime / 1000).toFixed(2)}s`);
  console.log(`Throughput: ${(results.length / (totalTime / 1000)).toFixed(2)} req/s`);

  printStats();

  console.log(`Created ${allCodes.length} short URLs.`);
}

main().catch(console.error);
