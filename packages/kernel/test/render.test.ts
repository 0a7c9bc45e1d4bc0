/**
 * envshift Kernel: Shell Rendering Tests
 *
 * Coverage:
 *   RD1: posix layout: paths, blank, variables, blank, aliases
 *   RD2: fish layout
 *   RD3: powershell PATH array, variables and functions
 *   RD4: cmd PATH line, variables and REM alias notes
 *   RD5: an empty environment renders only the header
 *   RD6: blank lines appear only after sections that emitted lines
 *   RD7: values are escaped for each shell's quoting rules
 *   RD8: sourceLine and scriptExtension per shell
 *   RD9: evaluated posix and fish PATH lines match applyEnvironment
 *   RD10: disabled aliases are left out of every shell
 */

import { describe, it, expect } from 'vitest';
import {
  EMPTY_ENVIRONMENT,
  EnvironmentDelta,
  ShellKind,
  applyEnvironment,
  renderEnvironment,
  scriptExtension,
  sourceLine,
} from '../src/index.js';
import type { EnvironmentState } from '../src/index.js';

const FULL: EnvironmentState = {
  paths_prepend: ['~/bin'],
  paths_append: ['/opt/extra'],
  variables: { EDITOR: 'vim', GOPATH: '/srv/go' },
  aliases: { ll: 'ls -la' },
  active: true,
};

describe('renderEnvironment', () => {
  it('RD1: posix layout: paths, blank, variables, blank, aliases', () => {
    expect(renderEnvironment(FULL, ShellKind.Posix)).toBe(
      '# envshift profile environment\n' +
        '\n' +
        'export PATH="$HOME/bin:$PATH"\n' +
        'export PATH="$PATH:/opt/extra"\n' +
        '\n' +
        'export EDITOR="vim"\n' +
        'export GOPATH="/srv/go"\n' +
        '\n' +
        "alias ll='ls -la'\n",
    );
  });

  it('RD2: fish layout', () => {
    expect(renderEnvironment(FULL, ShellKind.Fish)).toBe(
      '# envshift profile environment\n' +
        '\n' +
        'set -gx PATH ~/bin $PATH\n' +
        'set -gx PATH $PATH /opt/extra\n' +
        '\n' +
        'set -gx EDITOR "vim"\n' +
        'set -gx GOPATH "/srv/go"\n' +
        '\n' +
        "alias ll 'ls -la'\n",
    );
  });

  it('RD3: powershell PATH array, variables and functions', () => {
    expect(renderEnvironment(FULL, ShellKind.PowerShell)).toBe(
      '# envshift profile environment\n' +
        '\n' +
        '$env:Path = @(\n' +
        '    "~/bin",\n' +
        '    $env:Path,\n' +
        '    "/opt/extra"\n' +
        ") -join ';'\n" +
        '\n' +
        '$env:EDITOR = "vim"\n' +
        '$env:GOPATH = "/srv/go"\n' +
        '\n' +
        'function ll { ls -la }\n',
    );
  });

  it('RD4: cmd PATH line, variables and REM alias notes', () => {
    expect(renderEnvironment(FULL, ShellKind.Cmd)).toBe(
      '@echo off\n' +
        'REM envshift profile environment\n' +
        '\n' +
        'set PATH=~/bin;%PATH%;/opt/extra\n' +
        '\n' +
        'set EDITOR=vim\n' +
        'set GOPATH=/srv/go\n' +
        '\n' +
        'REM Aliases not supported in CMD batch files\n' +
        'REM ll = ls -la\n',
    );
  });

  it('RD5: an empty environment renders only the header', () => {
    expect(renderEnvironment(EMPTY_ENVIRONMENT, ShellKind.Posix)).toBe('# envshift profile environment\n\n');
    expect(renderEnvironment(EMPTY_ENVIRONMENT, ShellKind.Cmd)).toBe('@echo off\nREM envshift profile environment\n\n');
  });

  it('RD6: blank lines appear only after sections that emitted lines', () => {
    const aliasesOnly: EnvironmentState = { ...EMPTY_ENVIRONMENT, aliases: { gs: 'git status' } };
    expect(renderEnvironment(aliasesOnly, ShellKind.Posix)).toBe(
      "# envshift profile environment\n\nalias gs='git status'\n",
    );

    const pathsOnly: EnvironmentState = { ...EMPTY_ENVIRONMENT, paths_append: ['/opt/z'] };
    expect(renderEnvironment(pathsOnly, ShellKind.PowerShell)).toBe(
      "# envshift profile environment\n\n$env:Path = @(\n    $env:Path,\n    \"/opt/z\"\n) -join ';'\n\n",
    );
  });

  it('RD7: values are escaped for each shell quoting rules', () => {
    const tricky: EnvironmentState = {
      ...EMPTY_ENVIRONMENT,
      variables: { GREETING: 'say "hi"' },
      aliases: { q: "echo 'x'" },
    };
    expect(renderEnvironment(tricky, ShellKind.Posix)).toBe(
      '# envshift profile environment\n\n' +
        'export GREETING="say \\"hi\\""\n\n' +
        "alias q='echo '\\''x'\\'''\n",
    );
    expect(renderEnvironment(tricky, ShellKind.Fish)).toBe(
      '# envshift profile environment\n\n' +
        'set -gx GREETING "say \\"hi\\""\n\n' +
        "alias q 'echo \\'x\\''\n",
    );
    expect(renderEnvironment(tricky, ShellKind.PowerShell)).toBe(
      '# envshift profile environment\n\n' +
        '$env:GREETING = "say `"hi`""\n\n' +
        "function q { echo 'x' }\n",
    );
  });
});

describe('sourceLine / scriptExtension', () => {
  it('RD8: sourceLine and scriptExtension per shell', () => {
    expect(sourceLine(ShellKind.Posix, '/e/active.sh')).toBe('[ -f /e/active.sh ] && source /e/active.sh');
    expect(sourceLine(ShellKind.Fish, '/e/active.fish')).toBe('test -f /e/active.fish; and source /e/active.fish');
    expect(sourceLine(ShellKind.PowerShell, 'C:\\e\\active.ps1')).toBe('. "C:\\e\\active.ps1"');
    expect(sourceLine(ShellKind.Cmd, 'C:\\e\\active.bat')).toBeNull();
    expect([ShellKind.Posix, ShellKind.Fish, ShellKind.PowerShell, ShellKind.Cmd].map(scriptExtension)).toEqual([
      'sh',
      'fish',
      'ps1',
      'bat',
    ]);
  });
});

/** Run the PATH lines of a rendered script against a starting PATH. */
function evaluatePath(script: string, kind: ShellKind.Posix | ShellKind.Fish, start: string): string[] {
  let path = start.split(':');
  for (const line of script.split('\n')) {
    if (kind === ShellKind.Posix) {
      const match = /^export PATH="(.*)"$/.exec(line);
      if (match?.[1] !== undefined) path = match[1].replace('$PATH', path.join(':')).split(':');
    } else if (line.startsWith('set -gx PATH ')) {
      path = line
        .slice('set -gx PATH '.length)
        .split(' ')
        .flatMap((token) => (token === '$PATH' ? path : [token]));
    }
  }
  return path;
}

describe('PATH order', () => {
  const state: EnvironmentState = {
    ...EMPTY_ENVIRONMENT,
    paths_prepend: ['/bin-dir', '/a', '/b'],
    paths_append: ['/c', '/d'],
  };

  it('RD9: evaluated posix and fish PATH lines match applyEnvironment', () => {
    const delta = new EnvironmentDelta({ PATH: '/usr/bin' });
    applyEnvironment(state, delta);
    const expected = ['/bin-dir', '/a', '/b', '/usr/bin', '/c', '/d'];
    expect(delta.getPath()).toEqual(expected);

    expect(evaluatePath(renderEnvironment(state, ShellKind.Posix), ShellKind.Posix, '/usr/bin')).toEqual(expected);
    expect(evaluatePath(renderEnvironment(state, ShellKind.Fish), ShellKind.Fish, '/usr/bin')).toEqual(expected);
  });

  it('RD9: cmd lists prepends in order on one line', () => {
    expect(renderEnvironment(state, ShellKind.Cmd)).toContain('set PATH=/bin-dir;/a;/b;%PATH%;/c;/d\n');
  });
});

describe('disabled aliases', () => {
  const state: EnvironmentState = {
    ...EMPTY_ENVIRONMENT,
    aliases: { ll: 'ls -la', k: 'kubectl' },
    disabled_aliases: ['k'],
  };

  it('RD10: disabled aliases are left out of every shell', () => {
    expect(renderEnvironment(state, ShellKind.Posix)).toBe("# envshift profile environment\n\nalias ll='ls -la'\n");
    expect(renderEnvironment(state, ShellKind.Fish)).toBe("# envshift profile environment\n\nalias ll 'ls -la'\n");
    expect(renderEnvironment(state, ShellKind.PowerShell)).toBe(
      '# envshift profile environment\n\nfunction ll { ls -la }\n',
    );
    expect(renderEnvironment(state, ShellKind.Cmd)).toBe(
      '@echo off\nREM envshift profile environment\n\n' +
        'REM Aliases not supported in CMD batch files\nREM ll = ls -la\n',
    );
  });

  it('RD10: a script with every alias disabled has no alias section', () => {
    const allOff: EnvironmentState = { ...state, disabled_aliases: ['k', 'll'] };
    expect(renderEnvironment(allOff, ShellKind.Posix)).toBe('# envshift profile environment\n\n');
    expect(renderEnvironment(allOff, ShellKind.Cmd)).toBe('@echo off\nREM envshift profile environment\n\n');
  });
});
