import { describe, it, expect } from 'vitest'
import { LoaderError, TemplateRuntimeError } from '../../../core/errors.js'
import { Environment, type EnvironmentOptions } from '../../environment/environment.js'
import { TemplateFilter } from '../../extension/extension.js'
import { ArrayLoader } from '../../loader/array-loader.js'
import type { TemplateContext } from '../../runtime/template.js'
import { UnitRegistry } from '../../runtime/unit-registry.js'

function createEnv(templates: Record<string, string>, options: EnvironmentOptions = {}): Environment {
  return new Environment(new ArrayLoader(templates), { units: new UnitRegistry(), ...options })
}

function render(source: string, context: TemplateContext = {}, options: EnvironmentOptions = {}): string {
  return createEnv({ 'index.html': source }, options).render('index.html', context)
}

class Person {
  constructor(private readonly first: string) {}

  greet(): string {
    return `Hi ${this.first}`
  }
}

describe('rendering', () => {
  describe('output', () => {
    it('prints variables', () => {
      expect(render('Hello {{ name }}!', { name: 'World' })).toBe('Hello World!')
    })

    it('renders missing variables as empty', () => {
      expect(render('[{{ missing }}]')).toBe('[]')
    })

    it('escapes output as html by default', () => {
      expect(render('{{ html }}', { html: '<b>&</b>' })).toBe('&lt;b&gt;&amp;&lt;/b&gt;')
    })

    it('does not escape constants or safe filters', () => {
      expect(render('{{ "<br>" }}')).toBe('<br>')
      expect(render('{{ html|raw }}', { html: '<i>' })).toBe('<i>')
      expect(render('{{ text|e("js") }}', { text: 'a b' })).toBe('a\\u0020b')
    })

    it('leaves output alone when autoescaping is off', () => {
      expect(render('{{ html }}', { html: '<b>' }, { autoescape: false })).toBe('<b>')
    })

    it('trims whitespace around dashed delimiters', () => {
      expect(render('a  {{- "b" -}}  c')).toBe('abc')
    })

    it('drops comments', () => {
      expect(render('a{# hidden #}b')).toBe('ab')
    })
  })

  describe('expressions', () => {
    it('evaluates arithmetic', () => {
      expect(render('{{ 7 % 3 }}|{{ 2 + 3 * 4 }}|{{ -2 + 5 }}|{{ 10 / 4 }}')).toBe('1|14|3|2.5')
    })

    it('concatenates with ~', () => {
      expect(render('{{ "a" ~ 1 ~ name }}', { name: 'z' })).toBe('a1z')
    })

    it('evaluates containment', () => {
      expect(render('{{ "b" in "abc" ? "yes" : "no" }}')).toBe('yes')
      expect(render('{{ 4 not in [1, 2] ? "absent" : "present" }}')).toBe('absent')
    })

    it('evaluates tests', () => {
      expect(render('{{ missing is defined ? "d" : "u" }}')).toBe('u')
      expect(render('{{ 3 is odd ? 1 : 0 }}')).toBe('1')
      expect(render('{% if items is empty %}none{% endif %}', { items: [] })).toBe('none')
    })

    it('reads attributes of objects, arrays, maps and methods', () => {
      const context = {
        user: { name: 'Ann' },
        items: ['x', 'y'],
        map: new Map([['k', 'v']]),
        person: new Person('Bo'),
      }
      expect(render('{{ user.name }} {{ items.1 }} {{ items[0] }} {{ map.k }} {{ person.greet }}', context)).toBe(
        'Ann y x v Hi Bo'
      )
    })

    it('exposes the whole context as _context', () => {
      expect(render('{{ _context.name }}', { name: 'Ann' })).toBe('Ann')
    })
  })

  describe('filters and functions', () => {
    it('applies core filters', () => {
      expect(render('{{ name|upper }}', { name: 'ann' })).toBe('ANN')
      expect(render('{{ items|join(", ") }}', { items: ['a', 'b'] })).toBe('a, b')
      expect(render('{{ missing|default("n/a") }}')).toBe('n/a')
      expect(render('{{ items|length }}', { items: [1, 2, 3] })).toBe('3')
      expect(render('{{ "hello WORLD"|capitalize }}')).toBe('Hello world')
      expect(render('{{ [1, 2, 3]|reverse|join }}')).toBe('321')
      expect(render('{{ {a: 1, b: 2}|keys|join(",") }}')).toBe('a,b')
      expect(render('{{ data|json_encode|raw }}', { data: { a: [1, 'x'] } })).toBe('{"a":[1,"x"]}')
    })

    it('calls core functions', () => {
      expect(render('{{ range(1, 3)|join(",") }}')).toBe('1,2,3')
      expect(render('{{ range(3, 1)|join(",") }}')).toBe('3,2,1')
      expect(render('{{ max(1, 5, 3) }}')).toBe('5')
      expect(render('{{ min([4, 2, 8]) }}')).toBe('2')
    })

    it('wraps errors thrown by a filter', () => {
      const env = createEnv({ 'index.html': 'a\n{{ 1|boom }}' })
      env.addFilter(
        new TemplateFilter('boom', () => {
          throw new Error('boom')
        })
      )
      expect(() => env.render('index.html')).toThrow(TemplateRuntimeError)
      expect(() => env.render('index.html')).toThrow(
        'An exception has been thrown during the rendering of a template ("boom") in "index.html" at line 2.'
      )
    })
  })

  describe('control structures', () => {
    it('branches on if / elseif / else', () => {
      const source = '{% if n > 1 %}many{% elseif n == 1 %}one{% else %}none{% endif %}'
      expect(render(source, { n: 2 })).toBe('many')
      expect(render(source, { n: 1 })).toBe('one')
      expect(render(source, { n: 0 })).toBe('none')
    })

    it('loops with a loop variable', () => {
      const source =
        '{% for item in items %}{{ loop.index }}:{{ item }}{% if not loop.last %}, {% endif %}{% endfor %}'
      expect(render(source, { items: ['a', 'b', 'c'] })).toBe('1:a, 2:b, 3:c')
    })

    it('loops over keys and values', () => {
      expect(render('{% for k, v in user %}{{ k }}={{ v }};{% endfor %}', { user: { a: 1, b: 2 } })).toBe(
        'a=1;b=2;'
      )
    })

    it('renders the else branch of an empty loop', () => {
      expect(render('{% for x in [] %}{{ x }}{% else %}empty{% endfor %}')).toBe('empty')
    })

    it('keeps variables set inside a loop local to it', () => {
      expect(render('{% for x in [1, 2] %}{% set y = x %}{{ y }}{% endfor %}[{{ y }}]')).toBe('12[]')
    })

    it('sets variables', () => {
      expect(render('{% set greeting = "Hi " ~ name %}{{ greeting }}', { name: 'Ann' })).toBe('Hi Ann')
    })
  })

  describe('include', () => {
    const templates = {
      'part.html': '[{{ name }}]',
      'with.html': '{% include "part.html" with {name: "y"} %}',
      'only.html': '{% include "part.html" only %}',
      'missing.html': '{% include "nope.html" ignore missing %}ok',
      'broken.html': '{% include "nope.html" %}',
      'list.html': '{% include ["nope.html", "part.html"] %}',
    }

    it('shares the current context', () => {
      const env = createEnv({ ...templates, 'index.html': '{% include "part.html" %}' })
      expect(env.render('index.html', { name: 'x' })).toBe('[x]')
    })

    it('overlays and isolates variables', () => {
      const env = createEnv(templates)
      expect(env.render('with.html', { name: 'x' })).toBe('[y]')
      expect(env.render('only.html', { name: 'x' })).toBe('[]')
    })

    it('tries candidates in order', () => {
      expect(createEnv(templates).render('list.html', { name: 'x' })).toBe('[x]')
    })

    it('skips missing templates when asked', () => {
      expect(createEnv(templates).render('missing.html')).toBe('ok')
    })

    it('reports a missing template at the include line', () => {
      const env = createEnv(templates)
      expect(() => env.render('broken.html')).toThrow(LoaderError)
      expect(() => env.render('broken.html')).toThrow(
        'Template "nope.html" is not defined in "broken.html" at line 1.'
      )
    })
  })

  describe('strict variables', () => {
    const strict = { strictVariables: true }

    it('rejects undefined variables', () => {
      expect(() => render('a\n\n{{ missing }}', {}, strict)).toThrow(
        'Variable "missing" does not exist in "index.html" at line 3.'
      )
    })

    it('rejects undefined keys', () => {
      expect(() => render('{{ user.missing }}', { user: {} }, strict)).toThrow(
        'Key "missing" does not exist in "index.html" at line 1.'
      )
    })

    it('rejects attributes of null', () => {
      expect(() => render('{{ user.name }}', { user: null }, strict)).toThrow(
        'Impossible to access an attribute ("name") on a null variable in "index.html" at line 1.'
      )
    })

    it('still allows default and defined', () => {
      expect(render('{{ missing|default("x") }}', {}, strict)).toBe('x')
      expect(render('{{ missing is defined ? "d" : "u" }}', {}, strict)).toBe('u')
      expect(render('{{ user.missing|default("k") }}', { user: {} }, strict)).toBe('k')
    })
  })
})
