import { describe, it, expect, afterEach } from 'vitest';
import { RemoteQueryError } from '../../src/core/errors.js';
import {
  ResponsibilityResolver,
  auditMessage,
  isClosedInvestigationState,
} from '../../src/services/responsibilityResolver.js';
import { __enableTestLogCollector, __resetLoggerForTests } from '../../src/utils/logging.js';
import { FakeBuildServer } from '../utils/fakeBuildServer.js';
import {
  buildHref,
  buildTypeHref,
  investigationsHref,
  investigationsXml,
} from '../utils/teamcityXml.js';

const ref = (id: string) => ({ href: buildHref(id) });

describe('isClosedInvestigationState', () => {
  it.each(['TAKEN', 'FIXED'])('treats %s as closed', (state) => {
    expect(isClosedInvestigationState(state)).toBe(true);
  });

  it.each(['taken', 'Fixed', '', 'NONE', 'GIVEN_UP', ' TAKEN'])('treats "%s" as open', (state) => {
    expect(isClosedInvestigationState(state)).toBe(false);
  });

  it('treats a missing state as open', () => {
    expect(isClosedInvestigationState(undefined)).toBe(false);
  });
});

describe('ResponsibilityResolver', () => {
  afterEach(() => {
    __resetLoggerForTests();
  });

  it.each(['TAKEN', 'FIXED'])('reports taken when the investigation is %s', async (state) => {
    const server = new FakeBuildServer().brokenBuild({
      id: '101',
      buildTypeId: 'bt7',
      investigation: { state, assignee: 'Sam Lee' },
    });
    const res = await new ResponsibilityResolver(server).isResponsibilityTaken(ref('101'));
    expect(res).toEqual({ ok: true, value: true });
    expect(server.calls).toEqual([buildHref('101'), buildTypeHref('bt7'), investigationsHref('bt7')]);
  });

  it.each(['taken', '', 'NONE', 'GIVEN_UP'])('reports not taken for state "%s"', async (state) => {
    const server = new FakeBuildServer().brokenBuild({
      id: '101',
      buildTypeId: 'bt7',
      investigation: { state },
    });
    const res = await new ResponsibilityResolver(server).isResponsibilityTaken(ref('101'));
    expect(res).toEqual({ ok: true, value: false });
  });

  it('decides on the first investigation when the build type has several', async () => {
    const server = new FakeBuildServer()
      .brokenBuild({ id: '101', buildTypeId: 'bt7', investigation: 'none' })
      .route(
        investigationsHref('bt7'),
        investigationsXml([{ state: 'GIVEN_UP' }, { state: 'TAKEN', assignee: 'Ana Ruiz' }]),
      );
    const open = await new ResponsibilityResolver(server).resolve(ref('101'));
    expect(open.ok && open.value.taken).toBe(false);
    expect(open.ok && open.value.investigationState).toBe('GIVEN_UP');

    server.route(
      investigationsHref('bt7'),
      investigationsXml([{ state: 'FIXED', assignee: 'Sam Lee' }, { state: 'GIVEN_UP' }]),
    );
    const closed = await new ResponsibilityResolver(server).resolve(ref('101'));
    expect(closed.ok && closed.value.assignee).toBe('Sam Lee');
  });

  it('reports not taken without querying investigations when the build type has no link', async () => {
    const server = new FakeBuildServer().brokenBuild({
      id: '101',
      buildTypeId: 'bt7',
      investigation: 'no-link',
    });
    const res = await new ResponsibilityResolver(server).isResponsibilityTaken(ref('101'));
    expect(res).toEqual({ ok: true, value: false });
    expect(server.calls).toEqual([buildHref('101'), buildTypeHref('bt7')]);
  });

  it('reports not taken for an empty investigations collection', async () => {
    const server = new FakeBuildServer().brokenBuild({
      id: '101',
      buildTypeId: 'bt7',
      investigation: 'none',
    });
    const res = await new ResponsibilityResolver(server).isResponsibilityTaken(ref('101'));
    expect(res).toEqual({ ok: true, value: false });
  });

  it('reports not taken when the build has no build type', async () => {
    const server = new FakeBuildServer().route(
      buildHref('101'),
      `<build id="101" href="${buildHref('101')}"/>`,
    );
    const res = await new ResponsibilityResolver(server).isResponsibilityTaken(ref('101'));
    expect(res).toEqual({ ok: true, value: false });
    expect(server.calls).toEqual([buildHref('101')]);
  });

  it('reports not taken when an optional hop fails', async () => {
    const server = new FakeBuildServer()
      .brokenBuild({ id: '101', buildTypeId: 'bt7', investigation: { state: 'TAKEN' } })
      .route(investigationsHref('bt7'), new RemoteQueryError('Build server responded with error code: 500', investigationsHref('bt7'), 500));
    const res = await new ResponsibilityResolver(server).isResponsibilityTaken(ref('101'));
    expect(res).toEqual({ ok: true, value: false });
  });

  it('propagates a failure to fetch the build itself', async () => {
    const server = new FakeBuildServer();
    const res = await new ResponsibilityResolver(server).isResponsibilityTaken(ref('404'));
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error).toBeInstanceOf(RemoteQueryError);
    expect(res.error.message).toBe('Build server responded with error code: 404');
  });

  it('fills the verdict with build type, trigger user and assignee', async () => {
    const server = new FakeBuildServer().brokenBuild({
      id: '101',
      buildTypeId: 'bt7',
      name: 'Core :: Compile',
      triggeredBy: 'Jane Doe',
      investigation: { state: 'TAKEN', assignee: 'Sam Lee' },
    });
    const res = await new ResponsibilityResolver(server).resolve(ref('101'));
    expect(res).toEqual({
      ok: true,
      value: {
        buildRef: ref('101'),
        buildTypeName: 'Core :: Compile',
        triggeredBy: 'Jane Doe',
        investigationState: 'TAKEN',
        assignee: 'Sam Lee',
        taken: true,
      },
    });
  });

  it('logs an audit line per resolved build', async () => {
    const logs = __enableTestLogCollector('info');
    const server = new FakeBuildServer().brokenBuild({
      id: '101',
      buildTypeId: 'bt7',
      name: 'Core :: Compile',
      triggeredBy: 'Jane Doe',
      investigation: { state: 'FIXED', assignee: 'Sam Lee' },
    });
    await new ResponsibilityResolver(server).resolve(ref('101'));
    const entry = JSON.parse(logs[logs.length - 1]);
    expect(entry.msg).toBe(
      'Broken build: Core :: Compile (broken by Jane Doe), responsibility taken by Sam Lee',
    );
    expect(entry.taken).toBe(true);
  });
});

describe('auditMessage', () => {
  it('falls back to the build href and omits absent parts', () => {
    expect(auditMessage({ buildRef: ref('3'), taken: false })).toBe(
      `Broken build: ${buildHref('3')}`,
    );
  });
});
