/**
 * Session flow Integration Tests
 *
 * Hook files on disk, real `sh` commands, the real config store and the
 * turn loop, with a scripted provider in place of the model.
 */

import path from 'path';
import fs from 'fs-extra';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createAgentSession, type AgentSessionOptions } from '../../src/cli/session.js';
import { getDefaultConfig } from '../../src/core/config/loader.js';
import { EventContext } from '../../src/core/events/context.js';
import { loadRecentObservations } from '../../src/agent/observations.js';
import { ScriptedInteraction, ScriptedProvider, makeTempDir, textResponse, toolCallResponse } from '../helpers/fakes.js';

describe('agent session', () => {
  let root: string;
  let cwd: string;
  let userHooksDir: string;
  let repoHooksDir: string;
  let provider: ScriptedProvider;
  let hookMessages: string[];

  function createSession(overrides: Partial<AgentSessionOptions> = {}) {
    return createAgentSession({
      cwd,
      config: getDefaultConfig(),
      provider,
      interaction: new ScriptedInteraction(),
      onHookMessage: (text) => hookMessages.push(text),
      userHooksDir,
      repoHooksDir,
      sessionContext: 'Not a git repository',
      sessionId: 'session-test',
      ...overrides,
    });
  }

  beforeEach(async () => {
    root = await makeTempDir();
    cwd = path.join(root, 'project');
    userHooksDir = path.join(root, 'home', 'hooks');
    repoHooksDir = path.join(cwd, '.agentloop', 'hooks');
    await fs.ensureDir(cwd);
    provider = new ScriptedProvider();
    hookMessages = [];
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  it('should inject command output from a SessionStart hook before the next provider call', async () => {
    await fs.outputFile(
      path.join(repoHooksDir, 'greet.yaml'),
      'name: greet\ntrigger: SessionStart\nactions:\n  - type: command\n    command: echo hi\n    inject_as: greet\n',
    );
    const session = await createSession();

    const outcome = await session.hooks.run('SessionStart', EventContext.empty());
    expect(outcome.results).toHaveLength(1);
    expect(outcome.results[0]?.output).toContain('hi');
    expect(outcome.results[0]?.injectKey).toBe('greet');

    await session.agent.startSession();
    expect(session.agent.injected.get('greet')).toBe('hi');

    provider.enqueue(textResponse('Hello'));
    await session.agent.runTurn('hello');
    expect(provider.systemPrompts[0]).toContain('## Additional Context from Hooks\n### greet\nhi');
  });

  describe('env_set conditions', () => {
    const saved = process.env.FOO;

    afterEach(() => {
      if (saved === undefined) {
        delete process.env.FOO;
      } else {
        process.env.FOO = saved;
      }
    });

    it('should run the hook only once the variable is set', async () => {
      await fs.outputFile(
        path.join(userHooksDir, 'foo.yaml'),
        'name: foo\ntrigger: UserPromptSubmit\ncondition: env_set:FOO\nactions:\n  - type: command\n    command: echo foo is set\n',
      );
      const session = await createSession();
      delete process.env.FOO;

      expect((await session.hooks.run('UserPromptSubmit', EventContext.empty())).results).toEqual([]);

      process.env.FOO = '1';
      expect((await session.hooks.run('UserPromptSubmit', EventContext.empty())).results).toEqual([
        { hookName: 'foo', actionIndex: 0, output: 'foo is set', status: 'ok' },
      ]);
    });
  });

  it('should prefer the repo hook over a user hook with the same name', async () => {
    const hook = (text: string): string =>
      `name: welcome\ntrigger: SessionStart\nactions:\n  - type: message\n    text: ${text}\n`;
    await fs.outputFile(path.join(userHooksDir, 'welcome.yaml'), hook('from user'));
    await fs.outputFile(path.join(repoHooksDir, 'welcome.yml'), hook('from repo'));
    const session = await createSession();

    await session.agent.startSession();

    expect(session.registry.hooksFor('SessionStart')).toHaveLength(1);
    expect(hookMessages).toEqual(['from repo']);
  });

  it('should record a config flag and keep the other keys in the state file', async () => {
    const statePath = path.join(cwd, '.agentloop', 'state.json');
    await fs.outputFile(statePath, JSON.stringify({ theme: 'dark', onboarding: { tips: [1, 2] } }, null, 2));
    await fs.outputFile(
      path.join(repoHooksDir, 'tour.yaml'),
      [
        'name: tour',
        'trigger: SessionStart',
        'condition: config_flag:onboarding.demo_seen=false',
        'actions:',
        '  - type: message',
        '    text: Take the tour',
        '  - type: set_config',
        '    path: onboarding.demo_seen',
        '    value: true',
        '',
      ].join('\n'),
    );

    const first = await createSession();
    await first.agent.startSession();
    expect(hookMessages).toEqual(['Take the tour']);
    expect(await first.configStore.readFlag('onboarding.demo_seen')).toBe('true');

    const state: unknown = JSON.parse(await fs.readFile(statePath, 'utf-8'));
    expect(state).toEqual({ theme: 'dark', onboarding: { tips: [1, 2], demo_seen: true } });

    const second = await createSession();
    await second.agent.startSession();
    expect(hookMessages).toEqual(['Take the tour']);
  });

  it('should deny a tool call from a blocking PreToolUse hook', async () => {
    await fs.outputFile(
      path.join(repoHooksDir, 'no-writes.yaml'),
      [
        'name: no-writes',
        'trigger: PreToolUse',
        'actions:',
        '  - type: command',
        '    command: \'[ "$AGENTLOOP_TOOL_NAME" = write_file ] && { echo "writes are disabled" >&2; exit 2; } || exit 0\'',
        '',
      ].join('\n'),
    );
    provider.enqueue(
      toolCallResponse([{ id: 'call_1', name: 'write_file', args: { path: 'out.txt', content: 'x' } }]),
      textResponse('ok'),
    );
    const session = await createSession();

    const outcome = await session.agent.runTurn('write a file');

    expect(outcome.status).toBe('completed');
    expect(await fs.pathExists(path.join(cwd, 'out.txt'))).toBe(false);
    expect(provider.requests[1]?.messages[2]?.content).toBe(
      'Tool call denied: Blocked by hook "no-writes": writes are disabled',
    );
  });

  it('should inline @file input and keep the tool runs for the next session', async () => {
    await fs.outputFile(path.join(cwd, 'notes.txt'), 'hello\n');
    provider.enqueue(
      toolCallResponse([{ id: 'call_1', name: 'read_file', args: { path: 'notes.txt' } }]),
      textResponse('It says hello'),
    );
    const session = await createSession();

    await session.agent.runTurn('what is in @notes.txt?');
    expect(await session.agent.endSession()).toBe(1);

    expect(provider.requests[0]?.messages[0]?.content).toBe('what is in \n```\n// File: notes.txt\nhello\n\n```\n?');
    const [observation] = await loadRecentObservations(session.observations.filePath, 5);
    expect(observation).toMatchObject({
      toolName: 'read_file',
      output: '   1| hello',
      summary: 'notes.txt',
      sessionId: 'session-test',
    });
  });

  it('should load no hooks when hooks are disabled', async () => {
    await fs.outputFile(
      path.join(repoHooksDir, 'greet.yaml'),
      'name: greet\ntrigger: SessionStart\nactions:\n  - type: message\n    text: hi\n',
    );
    const session = await createSession({ hooksEnabled: false });

    await session.agent.startSession();

    expect(session.registry.size).toBe(0);
    expect(session.hooks.enabled).toBe(false);
    expect(hookMessages).toEqual([]);
  });
});
