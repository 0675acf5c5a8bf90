// ============================================
// 호스트 패키지 / 아카이브 관련 타입
// ============================================

/** 호스트에 설치된 패키지 하나 (dpkg-query 스냅샷) */
export interface PackageRecord {
  /** 패키지명. 멀티아키 한정자(`libc6:amd64`)가 붙어 있을 수 있음 */
  name: string;
  version: string;
  architecture: string;
}

/** 아카이브 내장 컨트롤 필드에서 읽은 식별 정보 */
export interface ArchiveIdentity {
  name: string;
  version: string;
  architecture: string;
}

/** installed-packages.csv 한 줄 */
export interface InventoryRow {
  package: string;
  version: string;
  architecture: string;
  sizeBytes: number;
  /** 저장소 루트 기준 상대 경로 (forward slash) */
  relativePath: string;
  sha256: string;
}

// ============================================
// 재조정(reconciliation) 결과 타입
// ============================================

/** 풀에서 기존 아카이브를 찾은 단계 */
export type MatchTier = 'exact' | 'fallback';

/** 리팩을 건너뛴 사유 */
export type SkipReason =
  | 'repack-unavailable'   // dpkg-repack 미설치
  | 'repack-failed'        // 가상/메타/config-only 패키지 등
  | 'no-archive-produced'  // 리팩은 성공했으나 레코드와 맞는 결과 파일이 없음
  | 'pool-name-conflict'   // 같은 이름의 다른 아카이브가 이미 풀에 있음
  | 'worker-error';        // 예기치 못한 워커 예외

export type ReconcileResult =
  | { status: 'present'; record: PackageRecord; path: string; tier: MatchTier }
  | { status: 'repacked'; record: PackageRecord; path: string }
  | { status: 'skipped'; record: PackageRecord; reason: SkipReason; detail: string };

export interface ReconciliationSummary {
  results: ReconcileResult[];
  present: number;
  repacked: number;
  /** skipped 전체 (failed 포함) */
  skipped: number;
  /** skipped 중 실행 오류로 인한 것 (worker-error, pool-name-conflict) */
  failed: number;
}

// ============================================
// 패키지 소스 (APT sources) 관련 타입
// ============================================

/** 소스 설정 파일 형식: 한 줄 형식(.list) 또는 deb822(.sources) */
export type SourceFormat = 'list' | 'deb822';

/** 활성화된 소스 엔트리 하나 */
export interface SourceEntry {
  /** 엔트리가 들어있는 설정 파일 */
  file: string;
  /** 파일 내 1부터 시작하는 줄 번호 */
  line: number;
  format: SourceFormat;
  uris: string[];
  /** `[trusted=yes]` 같은 옵션 */
  options: Record<string, string>;
  raw: string;
}

/** 호스트의 활성 소스 설정 */
export interface SourceSet {
  files: string[];
  entries: SourceEntry[];
  /** 읽지 못한 설정 파일 (권한, 끊긴 링크 등) */
  unreadable: { file: string; error: string }[];
}

/** 소스 전환 상태 머신의 상태 */
export type SwitchState = 'ACTIVE' | 'QUARANTINED' | 'SWITCHED' | 'VERIFIED' | 'FAILED';

export interface SwitchTransition {
  from: SwitchState;
  to: SwitchState;
  at: string;
  note?: string;
}
