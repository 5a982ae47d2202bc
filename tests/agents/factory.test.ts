import { describe, it, expect } from 'vitest';
import { createAgent, createAgents } from '../../src/agents/factory.js';
import { ALL_AGENT_ROLES } from '../../src/agents/types.js';
import { getDefaultConfig } from '../../src/core/config/manager.js';
import type { StepContext } from '../../src/core/workflow/graph.js';
import type { RunConfig } from '../../src/core/workflow/run-config.js';
import { createWorkflowState, type WorkflowState } from '../../src/core/workflow/state.js';
import { CancellationError, ServiceError, StepError } from '../../src/core/errors.js';
import { Semaphore } from '../../src/utils/semaphore.js';
import { FakeGenerationService, type Script } from '../support/fakes.js';

const runConfig: RunConfig = {
  interactive: false,
  maxRetries: 3,
  approvalTimeoutSeconds: 300,
  classificationFailure: 'fallback',
};

function ctx(config: Partial<RunConfig> = {}, signal = new AbortController().signal): StepContext<RunConfig> {
  return { runId: 'agent-run', signal, config: { ...runConfig, ...config } };
}

function agentsFor(script: Script) {
  const service = new FakeGenerationService(script);
  const agents = createAgents(getDefaultConfig(), { slots: new Semaphore(1), service });
  return { agents, service };
}

describe('createAgents', () => {
  it('creates one step per role, named after it', () => {
    const { agents } = agentsFor({});
    for (const role of ALL_AGENT_ROLES) {
      expect(agents[role].name).toBe(role);
      expect(agents[role].role).toBe(role);
    }
  });

  it('needs provider settings when no service is injected', () => {
    expect(() => createAgent('generator', getDefaultConfig(), { slots: new Semaphore(1) })).toThrow(ServiceError);
  });

  it('builds provider-backed agents from configured providers', () => {
    const config = getDefaultConfig({ providers: { openai: { apiKey: 'test-secret' } } });
    expect(createAgent('reviewer', config, { slots: new Semaphore(1) }).name).toBe('reviewer');
  });
});

describe('OrchestratorAgent', () => {
  it.each([
    ['GENERATE', 'GENERATE'],
    ['  review\n', 'REVIEW'],
    ['"Document."', 'DOCUMENT'],
    ['I think GENERATE', 'UNKNOWN'],
  ])('maps %j to %s', async (reply, decision) => {
    const { agents } = agentsFor({ orchestrator: reply });
    const next = await agents.orchestrator.apply(createWorkflowState('task'), ctx());
    expect(next.routingDecision).toBe(decision);
  });

  it('treats an empty answer as UNKNOWN', async () => {
    const { agents } = agentsFor({ orchestrator: '   ' });
    const next = await agents.orchestrator.apply(createWorkflowState('task'), ctx());
    expect(next.routingDecision).toBe('UNKNOWN');
  });

  it('passes errors that are not service failures through', async () => {
    const { agents } = agentsFor({ orchestrator: new Error('bug') });
    await expect(agents.orchestrator.apply(createWorkflowState('task'), ctx())).rejects.toThrow(StepError);
  });
});

describe('GeneratorAgent', () => {
  it('renders the task into both messages', async () => {
    const { agents, service } = agentsFor({ generator: '  code  ' });

    const next = await agents.generator.apply(createWorkflowState('sort a list'), ctx());

    expect(next.generatedArtifact).toBe('code');
    expect(service.calls[0]).toMatchObject({
      system: 'Write clean, efficient code for: sort a list.\nReturn ONLY the code, no explanations.',
      user: 'sort a list',
      options: { model: 'gpt-4o', temperature: 0.1, maxTokens: 2000 },
    });
  });

  it('ignores stale feedback before the first retry', async () => {
    const { agents, service } = agentsFor({ generator: 'code' });
    const state: WorkflowState = { ...createWorkflowState('sort'), reviewFeedback: 'fix it' };

    await agents.generator.apply(state, ctx());

    expect(service.calls[0]?.user).toBe('sort');
  });

  it('passes cancellation through unwrapped', async () => {
    const { agents } = agentsFor({ generator: new CancellationError() });
    await expect(agents.generator.apply(createWorkflowState('sort'), ctx())).rejects.toBeInstanceOf(CancellationError);
  });

  it('hands the run signal to the service', async () => {
    const controller = new AbortController();
    const { agents, service } = agentsFor({ generator: 'code' });

    await agents.generator.apply(createWorkflowState('sort'), ctx({}, controller.signal));

    expect(service.calls[0]?.options.signal).toBe(controller.signal);
  });
});

describe('DocumenterAgent', () => {
  it('documents the generated code when there is some', async () => {
    const { agents, service } = agentsFor({ documenter: 'documented' });
    const state: WorkflowState = { ...createWorkflowState('sort'), generatedArtifact: 'x = sorted(y)' };

    const next = await agents.documenter.apply(state, ctx());

    expect(next.documentedArtifact).toBe('documented');
    expect(service.calls[0]?.system).toBe(
      'Add detailed comments and a docstring to this code:\nx = sorted(y)\nReturn the code with inline comments.',
    );
    expect(service.calls[0]?.user).toBe('Document the code');
  });
});
