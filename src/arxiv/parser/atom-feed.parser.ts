import { Injectable, Logger } from '@nestjs/common';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { ArxivPaperDto } from '../dto/arxiv-paper.dto';
import { ArxivUtil } from '../util/arxiv.util';
import { ParseError } from '../../common/errors';

/**
 * preserveOrder 결과의 노드. 태그명 키 하나(자식 배열)와 선택적인 ':@'(속성) 또는 '#text'
 */
type XmlNode = Record<string, unknown>;
type NamespaceScope = ReadonlyMap<string, string>;

interface ScopedElement {
  node: XmlNode;
  scope: NamespaceScope;
}

export const ATOM_NAMESPACE = 'http://www.w3.org/2005/Atom';

const ATTR_PREFIX = '@_';
const ATTRS_KEY = ':@';
const TEXT_KEY = '#text';
const PDF_MIME_TYPE = 'application/pdf';

const BASE_SCOPE: NamespaceScope = new Map([
  ['xml', 'http://www.w3.org/XML/1998/namespace'],
]);

// XML 에 미리 정의된 엔티티. 그 외는 DOCTYPE 에서 선언된 경우만 허용
const PREDEFINED_ENTITIES = ['lt', 'gt', 'amp', 'apos', 'quot'];

@Injectable()
export class AtomFeedParser {
  private readonly logger = new Logger(AtomFeedParser.name);

  // 네임스페이스 판별과 혼합 콘텐츠의 앞쪽 텍스트를 위해 순서 보존 모드 사용
  private readonly parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTR_PREFIX,
    ignoreDeclaration: true,
    ignorePiTags: true,
    parseTagValue: false,
    parseAttributeValue: false,
    htmlEntities: true, // 숫자 문자 참조(&#...;) 디코딩
  });

  /**
   * Atom 피드 XML 을 문서 순서대로 논문 레코드 목록으로 변환
   * 형식이 잘못된 문서는 부분 결과 없이 ParseError 를 던집니다.
   */
  parse(xml: string): ArxivPaperDto[] {
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
      throw new ParseError(
        `Malformed feed document: ${validation.err.msg}`,
        validation.err.line,
      );
    }
    this.assertEntityReferences(xml);

    let document: unknown;
    try {
      document = this.parser.parse(xml);
    } catch (error) {
      throw new ParseError(
        `Malformed feed document: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        error,
      );
    }

    const root = this.findRoot(document);
    const papers = atomChildren(root, 'entry').map((entry) => this.toPaper(entry));

    this.logger.debug(`Parsed ${papers.length} entries`);
    return papers;
  }

  private findRoot(document: unknown): ScopedElement {
    const root = Array.isArray(document)
      ? document.find((node: unknown) => tagNameOf(node) !== undefined)
      : undefined;
    if (!isNode(root)) {
      throw new ParseError('Malformed feed document: no root element found');
    }
    return { node: root, scope: extendScope(BASE_SCOPE, root) };
  }

  /**
   * 선언되지 않은 엔티티 참조나 단독 '&' 는 XML 형식 오류
   */
  private assertEntityReferences(xml: string): void {
    const declared = new Set(PREDEFINED_ENTITIES);
    for (const match of xml.matchAll(/<!ENTITY\s+([^\s%>]+)/g)) {
      declared.add(match[1]);
    }

    // 주석과 CDATA 안의 '&' 는 참조가 아님 (길이를 유지해 줄 번호 보존)
    const body = xml.replace(/<!--[\s\S]*?-->|<!\[CDATA\[[\s\S]*?\]\]>/g, (section) =>
      section.replace(/[^\n]/g, ' '),
    );

    for (const match of body.matchAll(
      /&(#[0-9]+;|#x[0-9a-fA-F]+;|[A-Za-z_:][\w.:-]*;)?/g,
    )) {
      const reference: string | undefined = match[1];
      if (reference !== undefined && reference.startsWith('#')) continue;
      if (reference !== undefined && declared.has(reference.slice(0, -1))) continue;

      const line = body.slice(0, match.index).split('\n').length;
      throw new ParseError(
        reference === undefined
          ? 'Malformed feed document: unescaped "&"'
          : `Malformed feed document: undefined entity &${reference}`,
        line,
      );
    }
  }

  private toPaper(entry: ScopedElement): ArxivPaperDto {
    const id = atomText(entry, 'id');
    const authors = atomChildren(entry, 'author').map((author) =>
      atomText(author, 'name'),
    );

    return {
      id,
      title: atomText(entry, 'title'),
      authors,
      summary: atomText(entry, 'summary'),
      published: atomText(entry, 'published'),
      updated: atomText(entry, 'updated'),
      pdf_url: this.findPdfUrl(entry) || ArxivUtil.derivePdfUrl(id),
    };
  }

  /**
   * title="pdf" 또는 type="application/pdf" 인 첫 번째 link 의 href
   */
  private findPdfUrl(entry: ScopedElement): string {
    for (const link of atomChildren(entry, 'link')) {
      const title = attributeOf(link.node, 'title').toLowerCase();
      const type = attributeOf(link.node, 'type').toLowerCase();
      if (title === 'pdf' || type === PDF_MIME_TYPE) {
        return attributeOf(link.node, 'href');
      }
    }
    return '';
  }
}

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tagNameOf(value: unknown): string | undefined {
  if (!isNode(value)) return undefined;
  return Object.keys(value).find((key) => key !== ATTRS_KEY && key !== TEXT_KEY);
}

function childNodes(node: XmlNode): unknown[] {
  const tagName = tagNameOf(node);
  const children = tagName === undefined ? undefined : node[tagName];
  return Array.isArray(children) ? children : [];
}

function attributeOf(node: XmlNode, name: string): string {
  const attributes = node[ATTRS_KEY];
  if (!isNode(attributes)) return '';
  const value = attributes[`${ATTR_PREFIX}${name}`];
  return typeof value === 'string' ? value : '';
}

/**
 * 요소의 xmlns / xmlns:p 선언을 반영한 하위 스코프
 */
function extendScope(scope: NamespaceScope, node: XmlNode): NamespaceScope {
  const attributes = node[ATTRS_KEY];
  if (!isNode(attributes)) return scope;

  let extended: Map<string, string> | undefined;
  for (const [key, value] of Object.entries(attributes)) {
    const name = key.slice(ATTR_PREFIX.length);
    if (typeof value !== 'string') continue;
    if (name !== 'xmlns' && !name.startsWith('xmlns:')) continue;

    extended ??= new Map(scope);
    extended.set(name === 'xmlns' ? '' : name.slice('xmlns:'.length), value);
  }
  return extended ?? scope;
}

/**
 * Atom 네임스페이스에 속한 localName 자식 요소들 (문서 순서)
 */
function atomChildren(parent: ScopedElement, localName: string): ScopedElement[] {
  const matches: ScopedElement[] = [];
  for (const child of childNodes(parent.node)) {
    const tagName = tagNameOf(child);
    if (tagName === undefined || !isNode(child)) continue;

    const scope = extendScope(parent.scope, child);
    const separator = tagName.indexOf(':');
    const prefix = separator >= 0 ? tagName.slice(0, separator) : '';
    const local = separator >= 0 ? tagName.slice(separator + 1) : tagName;
    if (local === localName && scope.get(prefix) === ATOM_NAMESPACE) {
      matches.push({ node: child, scope });
    }
  }
  return matches;
}

/**
 * 첫 번째 Atom localName 자식의 텍스트. 첫 자식 요소 앞의 텍스트만 사용합니다.
 */
function atomText(parent: ScopedElement, localName: string): string {
  const [element] = atomChildren(parent, localName);
  if (element === undefined) return '';

  const parts: string[] = [];
  for (const child of childNodes(element.node)) {
    if (!isNode(child) || !(TEXT_KEY in child)) break;
    parts.push(String(child[TEXT_KEY]));
  }
  return ArxivUtil.normalizeWhitespace(parts.join(''));
}
