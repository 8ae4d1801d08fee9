import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FeedWriter } from './feed-writer';
import { ArxivPaperDto } from '../dto/arxiv-paper.dto';
import { ArxivFeedPayloadDto } from '../dto/arxiv-feed-payload.dto';
import { IOError } from '../../common/errors';

/**
 * FeedWriter 테스트
 * payload 구성 및 JSON 파일 저장을 검증합니다.
 */
describe('FeedWriter', () => {
  const NOW = new Date(Date.UTC(2024, 0, 15, 10, 30, 45, 500));

  let writer: FeedWriter;
  let tmpDir: string;

  beforeEach(() => {
    writer = new FeedWriter();
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'feed-writer-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('JSON저장', () => {
    it('payload는_메타데이터와함께저장되어야한다', () => {
      // given
      const outputPath = path.join(tmpDir, 'arxiv.json');
      const papers = [createPaper('1111.1111', 'A Paper')];

      // when
      writer.write(papers, outputPath, 'all:test', 5, NOW);

      // then: 2칸 들여쓰기, 키 순서 유지
      const lines = fs.readFileSync(outputPath, 'utf-8').split('\n');
      expect(lines.slice(0, 6)).toEqual([
        '{',
        '  "generated_at_utc": "2024-01-15T10:30:45Z",',
        '  "query": "all:test",',
        '  "max_results": 5,',
        '  "count": 1,',
        '  "papers": [',
      ]);
    });

    it('파일은_개행으로끝나야한다', () => {
      // given
      const outputPath = path.join(tmpDir, 'arxiv.json');

      // when
      writer.write([], outputPath, 'all:test', 5, NOW);

      // then
      const content = fs.readFileSync(outputPath, 'utf-8');
      expect(content.endsWith('}\n')).toBe(true);
      expect(content).toContain('"papers": []');
    });

    it('읽어온count는_papers길이와같아야한다', () => {
      // given
      const outputPath = path.join(tmpDir, 'arxiv.json');
      const papers = [
        createPaper('1111.1111', 'First'),
        createPaper('2222.2222', 'Second'),
        createPaper('3333.3333', 'Third'),
      ];

      // when
      writer.write(papers, outputPath, 'all:test', 10, NOW);

      // then
      const payload: ArxivFeedPayloadDto = JSON.parse(
        fs.readFileSync(outputPath, 'utf-8'),
      );
      expect(payload.count).toBe(3);
      expect(payload.papers).toHaveLength(payload.count);
      expect(payload.papers[1]).toEqual(papers[1]);
    });

    it('상위디렉토리가없으면_생성되어야한다', () => {
      // given
      const outputPath = path.join(tmpDir, 'a', 'b', 'c', 'arxiv.json');

      // when
      writer.write([], outputPath, 'all:test', 1, NOW);

      // then
      expect(fs.existsSync(outputPath)).toBe(true);
    });

    it('기존파일은_덮어써야한다', () => {
      // given
      const outputPath = path.join(tmpDir, 'arxiv.json');
      fs.writeFileSync(outputPath, 'stale content that is longer than the new one'.repeat(100));

      // when
      writer.write([], outputPath, 'all:fresh', 2, NOW);

      // then
      const payload: ArxivFeedPayloadDto = JSON.parse(
        fs.readFileSync(outputPath, 'utf-8'),
      );
      expect(payload.query).toBe('all:fresh');
      expect(payload.count).toBe(0);
    });

    it('비ASCII문자는_이스케이프없이저장되어야한다', () => {
      // given
      const outputPath = path.join(tmpDir, 'arxiv.json');
      const papers = [createPaper('1111.1111', 'Übersicht 研究')];

      // when
      writer.write(papers, outputPath, 'all:test', 1, NOW);

      // then
      const content = fs.readFileSync(outputPath, 'utf-8');
      expect(content).toContain('"title": "Übersicht 研究"');
    });

    it('반환값은_저장된payload와같아야한다', () => {
      // given
      const outputPath = path.join(tmpDir, 'arxiv.json');

      // when
      const payload = writer.write([], outputPath, 'all:test', 3, NOW);

      // then
      expect(payload).toEqual({
        generated_at_utc: '2024-01-15T10:30:45Z',
        query: 'all:test',
        max_results: 3,
        count: 0,
        papers: [],
      });
    });
  });

  describe('저장실패', () => {
    it('디렉토리경로에쓰면_IOError를던져야한다', () => {
      // when & then: 출력 경로가 디렉토리인 경우
      expect(() => writer.write([], tmpDir, 'all:test', 1, NOW)).toThrow(IOError);
    });

    it('IOError는_경로와원인을포함해야한다', () => {
      // given: 상위 경로가 파일이라 디렉토리를 만들 수 없는 경우
      const blocker = path.join(tmpDir, 'blocker');
      fs.writeFileSync(blocker, '');
      const outputPath = path.join(blocker, 'arxiv.json');

      // when
      let caught: unknown;
      try {
        writer.write([], outputPath, 'all:test', 1, NOW);
      } catch (error) {
        caught = error;
      }

      // then
      expect(caught).toBeInstanceOf(IOError);
      expect(caught).toMatchObject({ kind: 'io', path: outputPath });
      if (caught instanceof IOError) {
        expect(caught.cause).toBeDefined();
        expect(caught.message.endsWith(`: ${outputPath}`)).toBe(true);
      }
    });
  });

  /**
   * 테스트용 논문 레코드 생성
   */
  function createPaper(arxivId: string, title: string): ArxivPaperDto {
    return {
      id: `http://arxiv.org/abs/${arxivId}`,
      title,
      authors: ['Test Author'],
      summary: 'Summary',
      published: '2024-01-01T00:00:00Z',
      updated: '2024-01-02T00:00:00Z',
      pdf_url: `http://arxiv.org/pdf/${arxivId}.pdf`,
    };
  }
});
