import { describe, it, expect } from 'vitest';
import { parseInstalledList, queryInstalledPackages, sortRecords, recordKey } from './host-packages';
import { FakeCommandRunner } from '../../test-utils/fakes';

describe('host-packages', () => {
  describe('parseInstalledList', () => {
    it('세 필드 줄을 레코드로, 정렬/중복 제거', () => {
      const output = ['zlib1g:amd64 1:1.2.11 amd64', 'bash 5.1-6 amd64', 'bash 5.1-6 amd64', ''].join('\n');
      expect(parseInstalledList(output)).toEqual([
        { name: 'bash', version: '5.1-6', architecture: 'amd64' },
        { name: 'zlib1g:amd64', version: '1:1.2.11', architecture: 'amd64' },
      ]);
    });

    it('필드 수가 맞지 않는 줄은 무시', () => {
      expect(parseInstalledList('broken line\nfoo 1.0 all extra\nok 1 all\n')).toEqual([
        { name: 'ok', version: '1', architecture: 'all' },
      ]);
    });
  });

  describe('sortRecords', () => {
    it('코드 포인트 순 (대문자가 소문자보다 앞)', () => {
      const sorted = sortRecords([
        { name: 'b', version: '1', architecture: 'all' },
        { name: 'B', version: '1', architecture: 'all' },
        { name: 'a', version: '2', architecture: 'all' },
        { name: 'a', version: '10', architecture: 'all' },
      ]);
      expect(sorted.map(recordKey)).toEqual(['B 1 all', 'a 10 all', 'a 2 all', 'b 1 all']);
    });
  });

  describe('queryInstalledPackages', () => {
    it('dpkg-query 형식 인자로 호출', async () => {
      const runner = new FakeCommandRunner().on('dpkg-query', () => ({ stdout: 'curl 7.81 amd64\n' }));
      const records = await queryInstalledPackages(runner);

      expect(records).toEqual([{ name: 'curl', version: '7.81', architecture: 'amd64' }]);
      expect(runner.calls[0].args).toEqual(['-W', '-f=${binary:Package} ${Version} ${Architecture}\\n']);
    });

    it('조회 실패는 에러', async () => {
      const runner = new FakeCommandRunner().on('dpkg-query', () => ({ exitCode: 2, stderr: 'no db' }));
      await expect(queryInstalledPackages(runner)).rejects.toMatchObject({ code: 'COMMAND_FAILED' });
    });
  });
});
