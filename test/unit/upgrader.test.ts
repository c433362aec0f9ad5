import chalk from 'chalk'
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, beforeAll, beforeEach, describe, it, expect } from 'vitest'
import { PackageRecord } from '../../src/types'
import { PackageUpgrader } from '../../src/upgrader'
import { createRecordingLogger, FakeRunner, PIP } from './helpers'

const foo: PackageRecord = { name: 'foo', currentVersion: '1.0', latestVersion: '2.0' }
const bar: PackageRecord = { name: 'bar', currentVersion: '0.1', latestVersion: '0.2' }

describe('PackageUpgrader', () => {
  let cwd: string

  beforeAll(() => {
    chalk.level = 0
  })

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), 'pip-review-'))
  })

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true })
  })

  it('installs every package in one pip run', async () => {
    const runner = new FakeRunner()
    const { logger } = createRecordingLogger()

    const outcomes = await new PackageUpgrader(runner, PIP, logger, cwd).upgradePackages(
      [foo, bar],
      ['--user']
    )

    expect(runner.calls()).toEqual([['-m', 'pip', 'install', '-U', '--user', 'foo', 'bar']])
    expect(outcomes).toEqual([{ packages: ['foo', 'bar'], exitCode: 0 }])
  })

  it('reports a failed install without throwing', async () => {
    const runner = new FakeRunner({ call: () => 1 })
    const { logger, stderr, stdout } = createRecordingLogger()

    const outcomes = await new PackageUpgrader(runner, PIP, logger, cwd).upgradePackages([foo, bar], [])

    expect(outcomes).toEqual([{ packages: ['foo', 'bar'], exitCode: 1 }])
    expect(stderr).toEqual(['pip install exited with code 1 for foo, bar'])
    expect(stdout).toEqual(['⚠️  1 of 1 pip install run(s) failed: foo, bar'])
  })

  it('keeps going after a failure with continueOnFail', async () => {
    const exitCodes = [1, 0]
    const runner = new FakeRunner({ call: () => exitCodes.shift() ?? 0 })
    const { logger } = createRecordingLogger()

    const outcomes = await new PackageUpgrader(runner, PIP, logger, cwd).upgradePackages(
      [foo, bar],
      ['--pre'],
      { continueOnFail: true }
    )

    expect(runner.calls()).toEqual([
      ['-m', 'pip', 'install', '-U', '--pre', 'foo'],
      ['-m', 'pip', 'install', '-U', '--pre', 'bar'],
    ])
    expect(outcomes).toEqual([
      { packages: ['foo'], exitCode: 1 },
      { packages: ['bar'], exitCode: 0 },
    ])
  })

  it('writes the snapshot before the first install', async () => {
    writeFileSync(join(cwd, 'requirements.txt'), 'stale==0.0\n')
    const snapshots: string[] = []
    const runner = new FakeRunner({
      call: () => {
        snapshots.push(readFileSync(join(cwd, 'requirements.txt'), 'utf-8'))
        return 0
      },
    })
    const { logger } = createRecordingLogger()

    await new PackageUpgrader(runner, PIP, logger, cwd).upgradePackages([foo, bar], [], {
      freeze: true,
    })

    expect(snapshots).toEqual(['foo==1.0\nbar==0.1\n'])
  })

  it('leaves no snapshot without freeze', async () => {
    const { logger } = createRecordingLogger()
    await new PackageUpgrader(new FakeRunner(), PIP, logger, cwd).upgradePackages([foo], [])
    expect(existsSync(join(cwd, 'requirements.txt'))).toBe(false)
  })

  it('does nothing for an empty selection', async () => {
    const runner = new FakeRunner()
    const { logger, stdout } = createRecordingLogger()

    expect(await new PackageUpgrader(runner, PIP, logger, cwd).upgradePackages([], [])).toEqual(
      []
    )
    expect(runner.commands).toEqual([])
    expect(stdout).toEqual(['No packages to upgrade.'])
  })
})
