import {
  extractIdentifierColumn,
  MissingColumnError,
} from './csv-identifiers';

describe('extractIdentifierColumn', () => {
  it('reads the default column as text', () => {
    const csv = 'name,steam64_id\nalice,76561197960287930\nbob,76561198000000001\n';

    expect(extractIdentifierColumn(csv)).toEqual([
      '76561197960287930',
      '76561198000000001',
    ]);
  });

  it('ignores a leading byte order mark', () => {
    const csv = '\uFEFFsteam64_id,name\n76561197960287930,alice\n';

    expect(extractIdentifierColumn(csv)).toEqual(['76561197960287930']);
  });

  it('reads a caller-named column and skips empty cells', () => {
    const csv = 'player_id,note\n76561197960287930,first\n,second\n76561198000000001,third\n';

    expect(extractIdentifierColumn(csv, 'player_id')).toEqual([
      '76561197960287930',
      '76561198000000001',
    ]);
  });

  it('throws MissingColumnError naming the headers it found', () => {
    const csv = 'name,player_id\nalice,76561197960287930\n';

    expect(() => extractIdentifierColumn(csv)).toThrow(MissingColumnError);
    expect(() => extractIdentifierColumn(csv)).toThrow(
      "Column 'steam64_id' not found in CSV headers: [name, player_id]",
    );
  });
});
