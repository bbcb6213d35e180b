import { TemplateUtil } from './template.util';

describe('TemplateUtil', () => {
  describe('render', () => {
    it('should substitute every declared variable', () => {
      expect(
        TemplateUtil.render('redis://:${password}@${instanceName}:6379', {
          password: 'p1',
          instanceName: 'my-redis',
        }),
      ).toBe('redis://:p1@my-redis:6379');
    });

    it('should replace repeated placeholders', () => {
      expect(
        TemplateUtil.render('${namespace}/${namespace}', { namespace: 'ns1' }),
      ).toBe('ns1/ns1');
    });

    it('should leave unknown placeholders verbatim', () => {
      expect(
        TemplateUtil.render('${instanceName}:${port}', {
          instanceName: 'db',
        }),
      ).toBe('db:${port}');
    });

    it('should insert values literally', () => {
      expect(
        TemplateUtil.render('pw=${password}', { password: "$&$1$'" }),
      ).toBe("pw=$&$1$'");
    });

    it('should not substitute placeholders introduced by values', () => {
      expect(
        TemplateUtil.render('${instanceName}.${namespace}', {
          instanceName: '${namespace}',
          namespace: 'ns1',
        }),
      ).toBe('${namespace}.ns1');
    });

    it('should not let a stray opening brace swallow the next placeholder', () => {
      expect(
        TemplateUtil.render('cmd ${ x ${password}', { password: 'p1' }),
      ).toBe('cmd ${ x p1');
    });

    it('should replace a placeholder nested in stray braces', () => {
      expect(TemplateUtil.render('${${password}}', { password: 'p1' })).toBe(
        '${p1}',
      );
    });

    it('should return templates without placeholders unchanged', () => {
      expect(TemplateUtil.render('6379', { password: 'p1' })).toBe('6379');
    });
  });

  describe('placeholders', () => {
    it('should list referenced names once, in order', () => {
      expect(
        TemplateUtil.placeholders(
          '${password}@${instanceName}.${namespace}:${password}',
        ),
      ).toEqual(['password', 'instanceName', 'namespace']);
    });

    it('should skip text after a stray opening brace', () => {
      expect(TemplateUtil.placeholders('a ${ b ${namespace}')).toEqual([
        'namespace',
      ]);
    });

    it('should return an empty list for plain text', () => {
      expect(TemplateUtil.placeholders('plain')).toEqual([]);
    });
  });

  describe('isPlaceholderFor', () => {
    it('should match only a template that is exactly the placeholder', () => {
      expect(TemplateUtil.isPlaceholderFor('${password}', 'password')).toBe(
        true,
      );
      expect(TemplateUtil.isPlaceholderFor('x${password}', 'password')).toBe(
        false,
      );
      expect(TemplateUtil.isPlaceholderFor('${namespace}', 'password')).toBe(
        false,
      );
    });
  });
});
