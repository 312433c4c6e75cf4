/**
 * catch 블록에서 받은 값을 로그용 메시지로 변환합니다
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
}
