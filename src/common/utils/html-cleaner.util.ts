import * as cheerio from 'cheerio';
import { hasChildren, isText, AnyNode } from 'domhandler';

/**
 * 정제된 페이지 내용
 */
export interface CleanedPage {
  /** 페이지 제목 (<title>) */
  title: string;
  /** 본문 가시 텍스트 (블록마다 개행으로 구분) */
  text: string;
  /** <body> 존재 여부 */
  hasBody: boolean;
}

export const NO_TITLE_FOUND = 'No title found';
export const NO_BODY_CONTENT_FOUND = 'No body content found';

/**
 * HTML 정제 유틸리티
 *
 * 뉴스 홈페이지 HTML에서 기사와 무관한 요소를 제거하고 본문 텍스트만 추출합니다.
 */
export class HtmlCleaner {
  /** 본문에서 제거할 요소 */
  static readonly IRRELEVANT_TAGS = [
    'script',
    'style',
    'img',
    'input',
    'nav',
    'footer',
    'header',
    'form',
  ] as const;

  /**
   * HTML 문자열을 정제합니다
   *
   * @param html - 원본 HTML
   * @returns 제목, 본문 텍스트, <body> 존재 여부
   *
   * 처리 순서:
   * 1. htmlparser2로 파싱 (<body>를 임의로 생성하지 않음)
   * 2. <title> 추출 (없으면 "No title found")
   * 3. <body> 내부의 script, style, img, input, nav, footer, header, form 제거
   * 4. 문서 순서대로 텍스트 노드를 순회하며 trim 후 빈 블록은 버림
   * 5. 블록을 개행으로 연결
   */
  static clean(html: string): CleanedPage {
    const $ = cheerio.load(html, { xml: { xmlMode: false, decodeEntities: true } });

    const title = $('title').first().text().trim() || NO_TITLE_FOUND;

    const body = $('body').first();
    if (body.length === 0) {
      return { title, text: NO_BODY_CONTENT_FOUND, hasBody: false };
    }

    body.find(HtmlCleaner.IRRELEVANT_TAGS.join(', ')).remove();

    const blocks: string[] = [];
    for (const node of body.toArray()) {
      HtmlCleaner.collectText(node, blocks);
    }

    return { title, text: blocks.join('\n'), hasBody: true };
  }

  /**
   * 깊이 우선으로 텍스트 노드를 수집합니다 (주석 노드 제외)
   */
  private static collectText(node: AnyNode, blocks: string[]): void {
    if (isText(node)) {
      const text = node.data.trim();
      if (text) {
        blocks.push(text);
      }
      return;
    }

    if (hasChildren(node)) {
      for (const child of node.children) {
        HtmlCleaner.collectText(child, blocks);
      }
    }
  }
}
