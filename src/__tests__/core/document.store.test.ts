import { ConfigDocument } from '../../core/config.document';
import { MemoryDocumentStore, TomlDocumentStore } from '../../core/document.store';
import { MemoryFileSystem } from '../../core/memory.filesystem';
import { DocumentIoError, DocumentParseError } from '../../errors/document.error';

describe('TomlDocumentStore', () => {
  const configPath = '/home/test/.config/tendril/config.toml';
  let fileSystem: MemoryFileSystem;
  let store: TomlDocumentStore;

  beforeEach(() => {
    fileSystem = new MemoryFileSystem({ [configPath]: '[repos.vim]\ntarget = "~"\n' });
    store = new TomlDocumentStore(fileSystem);
  });

  it('should read and parse a document', async () => {
    const document = await store.read(configPath);

    expect(document.getRepo('vim')).toEqual({ name: 'vim', target: '~' });
    expect(await store.exists(configPath)).toBe(true);
  });

  it('should report a missing file as an I/O error', async () => {
    await expect(store.read('/home/test/missing.toml')).rejects.toThrow(DocumentIoError);
    expect(await store.exists('/home/test/missing.toml')).toBe(false);
  });

  it('should report malformed TOML with its position and path', async () => {
    fileSystem.seed(configPath, '[repos.vim]\ntarget = "~"\nbad line\n');

    const error = await store.read(configPath).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DocumentParseError);
    expect(error).toMatchObject({ line: 3, path: configPath });
  });

  it('should write the document text', async () => {
    const document = await store.read(configPath);
    document.addRepo({ name: 'zsh' });

    await store.write(document, configPath);

    expect(await fileSystem.readFile(configPath)).toBe('[repos.vim]\ntarget = "~"\n\n[repos.zsh]\n');
  });

  it('should keep the previous content when the write fails', async () => {
    const document = ConfigDocument.parse('[repos.other]\n');
    fileSystem.failWrites(new Error('disk full'));

    await expect(store.write(document, configPath)).rejects.toThrow(DocumentIoError);
    expect(await fileSystem.readFile(configPath)).toBe('[repos.vim]\ntarget = "~"\n');
  });

  it('should fail to write into a missing directory', async () => {
    const error = await store
      .write(ConfigDocument.empty(), '/nowhere/config.toml')
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DocumentIoError);
    expect(error).toMatchObject({ path: '/nowhere/config.toml' });
  });
});

describe('MemoryDocumentStore', () => {
  it('should keep written text by path', async () => {
    const store = new MemoryDocumentStore();
    const document = ConfigDocument.empty();
    document.addRepo({ name: 'vim', target: '~' });

    await store.write(document, '/cfg/config.toml');

    expect(store.textOf('/cfg/config.toml')).toBe('[repos.vim]\ntarget = "~"\n');
    expect(await store.exists('/cfg/config.toml')).toBe(true);
    expect((await store.read('/cfg/config.toml')).getRepo('vim')?.target).toBe('~');
  });

  it('should fail to read an unknown path', async () => {
    const store = new MemoryDocumentStore({ '/a.toml': 'x = 1\n' });

    await expect(store.read('/b.toml')).rejects.toThrow(DocumentIoError);
    await expect(store.read('/a.toml')).resolves.toBeInstanceOf(ConfigDocument);
  });
});
