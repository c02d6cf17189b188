#!/usr/bin/env node
import * as path from "path";
import * as readline from "readline";
import { config } from "dotenv";
import { loadConfig, type AppConfig } from "../lib/config";
import { ConfigError } from "../lib/errors";
import { configureLogger, createLogger } from "../lib/logger";
import { LLMService } from "../lib/llm/service";
import { ClaudeProvider } from "../lib/llm/providers/claude";
import { OpenAIProvider } from "../lib/llm/providers/openai";
import type { LLMProvider } from "../lib/llm/types";
import { Extractor } from "../lib/agent/extractor";
import { NegotiationAgent } from "../lib/agent/negotiation-agent";
import { LLMTranslator } from "../lib/agent/translator";
import { createParchiStore } from "../lib/storage";
import { TradeDesk } from "../lib/trade-desk";
import { printLedger, printTurnResult } from "./display";

config({ path: path.resolve(process.cwd(), ".env.local") });

const args = process.argv.slice(2);
const langIndex = args.indexOf("--lang");
const languageArg = langIndex !== -1 ? args[langIndex + 1] : undefined;
const vendorIndex = args.indexOf("--vendor");
const vendorArg = vendorIndex !== -1 ? args[vendorIndex + 1] : undefined;

function buildLLMService(appConfig: AppConfig): LLMService {
  const { llm } = appConfig;
  if (!llm.anthropicApiKey) {
    console.error("Error: ANTHROPIC_API_KEY not set in .env.local");
    process.exit(1);
  }

  const primary: LLMProvider = new ClaudeProvider(llm.anthropicApiKey, llm.primaryModel);
  let fallback: LLMProvider | undefined;
  if (llm.openaiApiKey) fallback = new OpenAIProvider(llm.openaiApiKey, llm.fallbackModel);

  return new LLMService({
    primaryProvider: primary,
    fallbackProvider: fallback,
    maxRetriesPerProvider: llm.maxRetriesPerProvider,
    retryDelayMs: llm.retryDelayMs,
    timeoutMs: llm.timeoutMs,
  });
}

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error("Invalid configuration:");
      err.issues.forEach((issue) => console.error(`  - ${issue}`));
      process.exit(1);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  const appConfig = readConfig();
  configureLogger(appConfig.log);
  const log = createLogger("cli/chat");

  const service = buildLLMService(appConfig);
  const agent = new NegotiationAgent({
    extractor: new Extractor(service),
    translator: new LLMTranslator(service),
    config: appConfig.agent,
  });
  const store = createParchiStore(appConfig.storage);
  const desk = new TradeDesk(agent, store);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  console.log("+==========================================+");
  console.log("|   Digital Parchi -- Trade Chat           |");
  console.log("|   You are the VENDOR. Describe a trade.  |");
  console.log("|   /ledger  /abandon  /quit               |");
  console.log("+==========================================+");
  console.log(`  Storage: ${appConfig.storage.backend}   Default language: ${appConfig.agent.defaultLanguage}\n`);

  const openSession = (): string => desk.open({ language: languageArg, vendorId: vendorArg ?? null });
  let sessionId = openSession();
  let turn = 0;

  const shutdown = async (): Promise<void> => {
    rl.close();
    await store.close();
    console.log("\nSession ended.");
  };

  const handleLine = async (trimmed: string): Promise<boolean> => {
    const command = trimmed.toLowerCase();
    if (command === "/quit" || command === "quit" || command === "exit") {
      return false;
    }

    if (command === "/ledger") {
      printLedger(await desk.ledger(20));
      return true;
    }

    if (command === "/abandon") {
      desk.abandon(sessionId);
      sessionId = openSession();
      turn = 0;
      console.log("  Trade abandoned. Starting a new one.");
      return true;
    }

    turn++;
    const submitted = await desk.submit(sessionId, trimmed);
    printTurnResult(submitted);

    if (submitted.result.terminal) {
      sessionId = openSession();
      turn = 0;
      console.log("\n  Ready for the next trade.");
    }
    return true;
  };

  const askForMessage = (): void => {
    rl.question(`[Vendor Turn ${turn + 1}] > `, (input) => {
      const trimmed = input.trim();
      if (!trimmed) {
        askForMessage();
        return;
      }

      handleLine(trimmed)
        .then(
          (keepGoing) => (keepGoing ? askForMessage() : shutdown()),
          (err: unknown) => {
            log.error({ err }, "turn failed");
            console.error(`\nError: ${err instanceof Error ? err.message : String(err)}`);
            askForMessage();
          }
        )
        .catch((err: unknown) => {
          console.error("Fatal error:", err);
          process.exit(1);
        });
    });
  };

  askForMessage();
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
