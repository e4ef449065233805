import { describe, it, expect } from 'vitest';
import { loadTrustCatalog } from '../src/catalog/index.js';
import { classifyConnection, normalizeHost } from '../src/classifier/index.js';
import { aggregateSession, buildSessionProfile, failedSessionProfile, ConnectionSet, defaultPort } from '../src/aggregate/index.js';
import { parseString } from '../src/parser/index.js';
import type { ClassifiedConnection, ConnectionReference, LogBundle, SessionMetadata } from '../src/types/index.js';

const catalog = loadTrustCatalog(['api.fabric.microsoft.com', '*.notebook.windows.net']);

const meta: SessionMetadata = {
  sessionId: 'sess-1',
  notebookId: 'nb-1',
  startTime: '2025-03-01T10:00:00Z',
  status: 'success',
  notebookName: 'Daily Load',
};

function ref(host: string, extra: Partial<ConnectionReference> = {}): ConnectionReference {
  return { kind: 'connection', host, marker: 'url', rawLine: host, lineNumber: 1, streamKind: 'stdout', ...extra };
}

function classified(host: string, extra: Partial<ClassifiedConnection> = {}): ClassifiedConnection {
  return { ...classifyConnection(ref(host), catalog), ...extra };
}

// ─── Classifier ──────────────────────────────────────────────────────

describe('classifyConnection', () => {
  it('normalizes the host before matching', () => {
    const c = classifyConnection(ref('API.Fabric.Microsoft.COM.', { port: 443, scheme: 'https' }), catalog);
    expect(c).toEqual({
      kind: 'connection',
      host: 'api.fabric.microsoft.com',
      port: 443,
      scheme: 'https',
      marker: 'url',
      rawLine: 'API.Fabric.Microsoft.COM.',
      lineNumber: 1,
      streamKind: 'stdout',
      trusted: true,
      matchedPattern: { pattern: 'api.fabric.microsoft.com', kind: 'exact' },
    });
  });

  it('marks unknown hosts external', () => {
    const c = classifyConnection(ref('evil-exfil.io'), catalog);
    expect(c.trusted).toBe(false);
    expect(c.matchedPattern).toBeUndefined();
  });

  it('gives the same answer when run on its own output', () => {
    for (const host of ['Foo.Notebook.Windows.NET', 'evil-exfil.io', 'api.fabric.microsoft.com']) {
      const once = classifyConnection(ref(host, { port: 443, scheme: 'https' }), catalog);
      expect(classifyConnection(once, catalog)).toEqual(once);
      expect(classifyConnection(ref(host, { port: 443, scheme: 'https' }), catalog)).toEqual(once);
    }
  });

  it('strips IPv6 brackets', () => {
    expect(normalizeHost('[FE80::1]')).toBe('fe80::1');
  });
});

// ─── Deduplication ───────────────────────────────────────────────────

describe('ConnectionSet', () => {
  it('treats a scheme default port as the same endpoint', () => {
    const set = new ConnectionSet();
    set.add(classified('host.com', { scheme: 'https' }));
    set.add(classified('host.com', { port: 443 }));
    expect(set.size).toBe(1);
  });

  it('collapses http://host.com:443 and host.com:443', () => {
    const set = new ConnectionSet();
    set.add(classified('host.com', { scheme: 'http', port: 443 }));
    set.add(classified('host.com', { port: 443 }));
    expect(set.values()).toHaveLength(1);
    expect(set.values()[0]?.scheme).toBe('http');
  });

  it('keeps the more qualified reference in the first slot', () => {
    const set = new ConnectionSet();
    set.add(classified('a.example.com'));
    set.add(classified('b.example.com'));
    set.add(classified('a.example.com', { scheme: 'https', port: 8443 }));
    expect(set.values().map(c => `${c.host}:${c.port ?? ''}`)).toEqual(['a.example.com:8443', 'b.example.com:']);
  });

  it('keeps different ports and schemes apart', () => {
    const set = new ConnectionSet();
    set.add(classified('h.example.com', { scheme: 'ftp', port: 21 }));
    set.add(classified('h.example.com', { scheme: 'http', port: 80 }));
    set.add(classified('h.example.com', { port: 8080 }));
    set.add(classified('other.example.com', { port: 21 }));
    expect(set.size).toBe(4);
  });

  it('looks up default ports by scheme', () => {
    expect(defaultPort('HTTPS')).toBe(443);
    expect(defaultPort('jdbc:sqlserver')).toBe(1433);
    expect(defaultPort('constructor')).toBeUndefined();
    expect(defaultPort(undefined)).toBeUndefined();
  });
});

// ─── Aggregation ─────────────────────────────────────────────────────

describe('aggregateSession', () => {
  it('merges streams in livy, stdout, stderr order', () => {
    const profile = aggregateSession(meta, {
      stderr: parseString('pip install late', 'stderr'),
      livy: parseString('pip install early', 'livy'),
      stdout: parseString('pip install middle', 'stdout'),
    }, catalog);
    expect(profile.packageInstalls.map(i => i.packages[0])).toEqual(['early', 'middle', 'late']);
  });

  it('flags external activity and disabled logging', () => {
    const profile = aggregateSession(meta, {
      stdout: parseString([
        'Connecting to api.fabric.microsoft.com',
        'Connecting to https://evil-exfil.io:443/upload',
        'logging.disable(logging.CRITICAL)',
        'INFO nothing to see',
      ].join('\n')),
    }, catalog);

    expect(profile.connections.map(c => [c.host, c.trusted])).toEqual([
      ['api.fabric.microsoft.com', true],
      ['evil-exfil.io', false],
    ]);
    expect(profile.hasExternalActivity).toBe(true);
    expect(profile.loggingDisabled).toBe(true);
    expect(profile.parseWarnings).toBe(1);
  });

  it('yields an empty profile for a session with nothing recognisable', () => {
    const profile = aggregateSession(meta, {}, catalog);
    expect(profile).toEqual({
      ...meta,
      connections: [],
      packageInstalls: [],
      loggingChanges: [],
      hasExternalActivity: false,
      loggingDisabled: false,
      parseWarnings: 0,
      warnings: [],
    });
  });

  it('collapses the same endpoint seen on different streams', () => {
    const profile = aggregateSession(meta, {
      livy: parseString('http://host.com:443', 'livy'),
      stderr: parseString('Connecting to host.com:443', 'stderr'),
    }, catalog);
    expect(profile.connections.map(c => [c.host, c.port, c.scheme, c.streamKind])).toEqual([
      ['host.com', 443, 'http', 'livy'],
    ]);
    expect(profile.hasExternalActivity).toBe(true);
  });

  it('keeps version numbers out of the connections', () => {
    const profile = aggregateSession(meta, {
      stdout: parseString('Python target: 3.10\nSpark target 3.5.0\nPUT 1.5 GB to cache', 'stdout'),
    }, catalog);
    expect(profile.connections).toEqual([]);
    expect(profile.hasExternalActivity).toBe(false);
  });

  it('only trusted connections means no external activity', () => {
    const profile = aggregateSession(meta, {
      livy: parseString('GET foo.notebook.windows.net/status', 'livy'),
    }, catalog);
    expect(profile.connections).toHaveLength(1);
    expect(profile.hasExternalActivity).toBe(false);
  });
});

describe('buildSessionProfile', () => {
  function bundle(streams: LogBundle['streams']): LogBundle {
    return { ...meta, streams };
  }

  it('warns about missing, duplicate and foreign streams', () => {
    const profile = buildSessionProfile(bundle([
      { sessionId: 'sess-1', streamKind: 'livy', text: 'pip install a' },
      { sessionId: 'sess-1', streamKind: 'livy', text: 'pip install b' },
      { sessionId: 'other', streamKind: 'stdout', text: 'pip install c' },
    ]), catalog);

    expect(profile.packageInstalls.map(i => i.packages)).toEqual([['a']]);
    expect(profile.warnings).toEqual([
      'duplicate livy stream ignored',
      'stdout stream belongs to session other; ignored',
      'missing stdout stream',
      'missing stderr stream',
    ]);
  });

  it('carries loader warnings forward and drops the streams', () => {
    const profile = buildSessionProfile({
      ...bundle([
        { sessionId: 'sess-1', streamKind: 'livy', text: '' },
        { sessionId: 'sess-1', streamKind: 'stdout', text: '' },
        { sessionId: 'sess-1', streamKind: 'stderr', text: '' },
      ]),
      warnings: ['could not read driver_stderr.log: EACCES'],
    }, catalog);
    expect(profile.warnings).toEqual(['could not read driver_stderr.log: EACCES']);
    expect('streams' in profile).toBe(false);
  });
});

describe('failedSessionProfile', () => {
  it('records the failure as a warning', () => {
    const profile = failedSessionProfile(meta, new Error('boom'));
    expect(profile.sessionId).toBe('sess-1');
    expect(profile.hasExternalActivity).toBe(false);
    expect(profile.warnings).toEqual(['session processing failed: boom']);
  });
});
