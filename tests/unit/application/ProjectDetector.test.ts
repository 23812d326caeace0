import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ProjectDetector } from '../../../src/application/ProjectDetector.js';

describe('ProjectDetector', () => {
  let projectDir: string;
  const detector = new ProjectDetector('native-build.toml');

  const touch = (relative: string) => {
    const file = path.join(projectDir, relative);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, '');
  };

  beforeEach(() => {
    projectDir = fs.mkdtempSync(path.join(os.tmpdir(), 'buildmux-detect-'));
  });

  afterEach(() => {
    fs.rmSync(projectDir, { recursive: true, force: true });
  });

  it('should find nothing in an empty directory', () => {
    expect(detector.detect(projectDir)).toEqual({ projectPath: projectDir, backendType: undefined, markers: [] });
  });

  it('should detect a managed build project', () => {
    touch('settings.gradle.kts');
    expect(detector.detect(projectDir).backendType).toBe('MANAGED_BUILD_TOOL');
  });

  it('should detect a package manager project', () => {
    touch('Cargo.toml');
    expect(detector.detect(projectDir).backendType).toBe('PACKAGE_MANAGER');
  });

  it('should detect the native driver manifest', () => {
    touch('native-build.toml');
    expect(detector.detect(projectDir).backendType).toBe('NATIVE_DRIVER_EXPERIMENTAL');
  });

  it('should detect HYBRID when a nested native library sits beside a managed build', () => {
    touch('build.gradle');
    touch(path.join('rust-lib', 'Cargo.toml'));

    const detection = detector.detect(projectDir);

    expect(detection.backendType).toBe('HYBRID');
    expect(detection.markers).toEqual(['build.gradle', path.join('rust-lib', 'Cargo.toml')]);
  });
});
