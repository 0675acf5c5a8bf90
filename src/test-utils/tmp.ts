import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';

/**
 * os.tmpdir() 아래 임시 디렉토리 생성
 */
export async function makeTempDir(prefix = 'debsnap-test-'): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * 상대 경로 → 내용 맵으로 파일 트리 작성
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    await fs.ensureDir(path.dirname(target));
    await fs.writeFile(target, content, 'utf-8');
  }
}
