import { describe, expect, it } from 'vitest';

import { buildDiskImageCommand, parseDiskImageOutput, resolveDiskImages } from './query';

describe('disk image query', () => {
  it('quotes host and registry arguments for PowerShell', () => {
    const command = buildDiskImageCommand({
      hostName: 'vdi-001.corp.example',
      registryPath: "HKLM:\\SOFTWARE\\O'Brien",
      valueName: 'DiskName',
    });

    expect(command).toContain("-ComputerName 'vdi-001.corp.example'");
    expect(command).toContain("-ArgumentList 'HKLM:\\SOFTWARE\\O''Brien', 'DiskName'");
  });

  it('reads the identifier from the JSON payload', () => {
    expect(parseDiskImageOutput({ disk_image: 'XDP07SLHS-230401.vhd' })).toBe('XDP07SLHS-230401.vhd');
    expect(parseDiskImageOutput({ disk_image: null })).toBeNull();
    expect(parseDiskImageOutput('  ')).toBeNull();
    expect(parseDiskImageOutput(7)).toBeNull();
  });
});

describe('resolveDiskImages', () => {
  it('queries each distinct host once and maps failures and timeouts to null', async () => {
    const asked: string[] = [];
    const res = await resolveDiskImages(['vdi-1', 'vdi-2', 'vdi-1', ' ', 'vdi-3', 'vdi-4'], {
      concurrency: 4,
      timeoutMs: 50,
      query: (host) => {
        asked.push(host);
        if (host === 'vdi-1') return Promise.resolve('XDP07SLHS-230401.vhd');
        if (host === 'vdi-2') return Promise.resolve(null);
        if (host === 'vdi-3') return Promise.reject(new Error('WinRM cannot complete the operation'));
        return new Promise<string | null>(() => {});
      },
    });

    expect(asked).toEqual(['vdi-1', 'vdi-2', 'vdi-3', 'vdi-4']);
    expect(Object.fromEntries(res.images)).toEqual({
      'vdi-1': 'XDP07SLHS-230401.vhd',
      'vdi-2': null,
      'vdi-3': null,
      'vdi-4': null,
    });
    expect(res).toMatchObject({ resolved: 1, failed: 1, timedOut: 1 });
  });
});
