#!/usr/bin/env node
import { createInterface } from 'node:readline';
import { existsSync, writeFileSync } from 'node:fs';
import { stringify } from 'yaml';
import { DEFAULT_RUNTIME_CONFIG, parseHostConfig } from './config.js';
import { describeError } from './errors.js';

const CONFIG_FILE = process.env.CONFIG_PATH ?? 'config.yaml';

const rl = createInterface({ input: process.stdin, output: process.stdout });

function ask(question: string, defaultValue?: string): Promise<string> {
  const suffix = defaultValue ? ` (${defaultValue})` : '';
  return new Promise((resolve) => {
    rl.question(`${question}${suffix}: `, (answer) => {
      resolve(answer.trim() || defaultValue || '');
    });
  });
}

function askYN(question: string, defaultYes = false): Promise<boolean> {
  const hint = defaultYes ? '(Y/n)' : '(y/N)';
  return new Promise((resolve) => {
    rl.question(`${question} ${hint}: `, (answer) => {
      const a = answer.trim().toLowerCase();
      if (a === '') resolve(defaultYes);
      else resolve(a === 'y' || a === 'yes');
    });
  });
}

async function askNumber(question: string, defaultValue: number): Promise<number> {
  const answer = await ask(question, String(defaultValue));
  const value = Number(answer);
  return Number.isFinite(value) ? value : defaultValue;
}

async function main(): Promise<void> {
  console.log('\n=== imsg-relay setup ===\n');

  if (existsSync(CONFIG_FILE)) {
    const reconfigure = await askYN(`${CONFIG_FILE} already exists. Reconfigure?`);
    if (!reconfigure) {
      console.log('Setup cancelled.');
      rl.close();
      return;
    }
  }

  console.log('\n--- Message store ---');
  const storePath = await ask('Path to chat.db', '~/Library/Messages/chat.db');
  const ignoreGroupChats = await askYN('Ignore group chats?', true);
  const pollIntervalMs = await askNumber('Poll interval (ms)', 5_000);

  console.log('\n--- Completion API ---');
  console.log('  The key can reference an environment variable, e.g. ${DEEPSEEK_API_KEY}.');
  const apiKey = await ask('API key', '${DEEPSEEK_API_KEY}');
  const apiUrl = await ask('API URL', DEFAULT_RUNTIME_CONFIG.apiUrl);
  const modelName = await ask('Model', DEFAULT_RUNTIME_CONFIG.modelName);
  const systemPrompt = await ask('System prompt', DEFAULT_RUNTIME_CONFIG.systemPrompt);
  const temperature = await askNumber('Temperature (0 - 1.5)', DEFAULT_RUNTIME_CONFIG.temperature);
  const maxHistory = await askNumber('History depth (1 - 50)', DEFAULT_RUNTIME_CONFIG.maxHistory);

  console.log('\n--- Web console ---');
  const webEnabled = await askYN('Enable web console?', true);
  const webConfig: Record<string, unknown> = { enabled: webEnabled };
  if (webEnabled) {
    webConfig.port = await askNumber('Console port', 8888);
  }

  const config = {
    messageStore: { path: storePath, ignoreGroupChats },
    sync: { pollIntervalMs },
    runtimeDefaults: { apiKey, apiUrl, modelName, systemPrompt, temperature, maxHistory },
    web: webConfig,
  };

  // Validate before writing; placeholders resolve to '' here, which the schema accepts.
  try {
    parseHostConfig(config);
  } catch (err) {
    console.error(`\nConfiguration rejected: ${describeError(err)}`);
    rl.close();
    process.exitCode = 1;
    return;
  }

  writeFileSync(CONFIG_FILE, stringify(config), 'utf-8');
  console.log(`\n${CONFIG_FILE} written successfully.\n`);

  console.log('Setup complete! Run "npm start" to launch the relay.');
  console.log('The terminal running it needs Full Disk Access to read chat.db.');
  if (webEnabled) {
    console.log(`Console will be available at http://127.0.0.1:${String(webConfig.port)}`);
  }

  rl.close();
}

main().catch((err) => {
  console.error('Setup failed:', err);
  process.exit(1);
});
