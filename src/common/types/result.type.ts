/**
 * 실패 유형
 *
 * 파이프라인 각 단계에서 발생할 수 있는 실패를 구분합니다.
 */
export type FailureKind =
  | 'fetch'
  | 'llm-transport'
  | 'llm-invalid-json'
  | 'llm-schema-mismatch'
  | 'orchestration'
  | 'store-write'
  | 'mirror-write';

export interface Success<T> {
  ok: true;
  value: T;
}

export interface Failure {
  ok: false;
  kind: FailureKind;
  /** 로그에 그대로 출력되는 진단 메시지 */
  detail: string;
}

/**
 * 성공/실패 결과 타입
 *
 * 예외 대신 결과 값으로 실패를 전달합니다.
 */
export type Result<T> = Success<T> | Failure;

export function success<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function failure(kind: FailureKind, detail: string): Failure {
  return { ok: false, kind, detail };
}
