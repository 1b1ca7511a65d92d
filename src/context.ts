import { AppConfig, loadConfig } from './config';
import { LLMService } from './services/llm-service';
import { getLLMService } from './services/llm-service-factory';
import { PromptStore } from './services/prompt-store';
import { EmailGenerator, PipelineEmailGenerator } from './services/email-generator';
import { TestRunner } from './services/test-runner';
import { FailureAnalyzer } from './services/failure-analyzer';
import { PromptAdapter } from './services/prompt-adapter';
import { ProspectGenerator } from './services/prospect-generator';
import { IterationLog } from './services/iteration-log';
import { ImprovementConfig, ImprovementOrchestrator, ProspectSource } from './services/improvement-orchestrator';

export interface AppContext {
  config: AppConfig;
  llmService: LLMService;
  store: PromptStore;
  generator: EmailGenerator;
  prospects: ProspectSource;
}

export function createContext(config: AppConfig = loadConfig(), overrides: Partial<Omit<AppContext, 'config'>> = {}): AppContext {
  const llmService = overrides.llmService ?? getLLMService(config.llm);
  const store = overrides.store ?? new PromptStore(config.agentsConfigPath, config.tasksConfigPath);
  return {
    config,
    llmService,
    store,
    generator: overrides.generator ?? new PipelineEmailGenerator(llmService, store),
    prospects: overrides.prospects ?? new ProspectGenerator(),
  };
}

export function createOrchestrator(ctx: AppContext, runId: string, improvement: ImprovementConfig): ImprovementOrchestrator {
  return new ImprovementOrchestrator(
    {
      store: ctx.store,
      prospects: ctx.prospects,
      runner: new TestRunner(ctx.generator, { timeoutMs: ctx.config.generationTimeoutMs }),
      analyzer: new FailureAnalyzer(ctx.llmService),
      adapter: new PromptAdapter(ctx.llmService),
      log: new IterationLog(ctx.config.logDir, runId),
    },
    improvement
  );
}
