import { expandPath } from '../../utils/path.expander';

describe('expandPath', () => {
  const home = '/home/test';

  it('should expand a leading tilde', () => {
    expect(expandPath('~', { home, env: {} })).toBe('/home/test');
    expect(expandPath('~/.vim', { home, env: {} })).toBe('/home/test/.vim');
  });

  it('should leave other tildes alone', () => {
    expect(expandPath('~other/.vim', { home, env: {} })).toBe('~other/.vim');
    expect(expandPath('/srv/~/x', { home, env: {} })).toBe('/srv/~/x');
  });

  it('should take the home directory from HOME by default', () => {
    expect(expandPath('~/src', { env: { HOME: '/users/test' } })).toBe('/users/test/src');
    expect(expandPath('~/src', { env: {} })).toBe('~/src');
  });

  it('should expand bare and braced variables', () => {
    const env = { PROJECT: '/proj', NAME: 'vim' };

    expect(expandPath('$PROJECT/sub', { env })).toBe('/proj/sub');
    expect(expandPath('${PROJECT}/${NAME}rc', { env })).toBe('/proj/vimrc');
  });

  it('should expand unset variables to an empty string', () => {
    expect(expandPath('/base/$UNSET/x', { env: {} })).toBe('/base//x');
  });

  it('should expand both in one path', () => {
    expect(expandPath('~/$NAME', { home, env: { NAME: 'notes' } })).toBe('/home/test/notes');
  });
});
