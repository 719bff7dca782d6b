import { strict as assert } from 'node:assert';
import { describe, it } from 'mocha';
import { analyzeScopes } from '../../src/analysis/scopes';
import { collectUsage, collectUsageSites } from '../../src/analysis/usage-collector';
import { parseModule } from '../../src/parsing/python-parser';
import { createSourceFile } from '../../src/parsing/source-file';

function usage(source: string): string[] {
    return [...collectUsage(createSourceFile('/project/target.py', source))].sort();
}

describe('usage-collector', () => {
    // ------------------------------------------------------------------
    // Free names
    // ------------------------------------------------------------------
    describe('free names', () => {
        it('reports names used but never bound', () => {
            assert.deepEqual(usage('from shapes import *\n\nprint(area(Circle(2)))\n'), ['Circle', 'area']);
        });

        it('excludes builtins and implicit module globals', () => {
            assert.deepEqual(usage('print(len(__name__), __file__)\n'), []);
        });

        it('excludes module-level names read from functions', () => {
            assert.deepEqual(usage('def f():\n    return later\n\nlater = 1\n'), []);
        });

        it('excludes explicitly imported names', () => {
            assert.deepEqual(usage('import os.path\nfrom x import y as z\nos.getcwd(); z()\n'), []);
        });

        it('counts only the base of an attribute chain', () => {
            assert.deepEqual(usage('config.section.value\n'), ['config']);
        });

        it('reads a global that a function declares but never assigns', () => {
            assert.deepEqual(usage('def f():\n    global registry\n    return registry\n'), ['registry']);
        });
    });

    // ------------------------------------------------------------------
    // Reads that run before the module binds the name
    // ------------------------------------------------------------------
    describe('module-level rebinding', () => {
        it('reads the target of an augmented assignment', () => {
            assert.deepEqual(usage('from .base import *\n\nDEBUG = True\nINSTALLED_APPS += ["x"]\n'), ['INSTALLED_APPS']);
        });

        it('reads a name on the right-hand side of its own first assignment', () => {
            assert.deepEqual(usage('TIMEOUT = TIMEOUT * 2\n'), ['TIMEOUT']);
        });

        it('reads a class attribute from the module until the class binds it', () => {
            assert.deepEqual(usage('class C:\n    label = label.upper()\n'), ['label']);
        });

        it('does not read names the module bound earlier', () => {
            assert.deepEqual(usage('label = "x"\nclass C:\n    label = label.upper()\n'), []);
            assert.deepEqual(usage('def f():\n    return limit\n\nlimit = 10\nlimit += 1\n'), []);
        });

        it('marks names bound only through global as optional', () => {
            const sites = collectUsageSites(createSourceFile('/project/t.py', 'def bump():\n    global counter\n    counter += 1\n'));
            assert.deepEqual([...sites], [['counter', { span: { start: 35, end: 42 }, optional: true }]]);
        });
    });

    // ------------------------------------------------------------------
    // Local scopes
    // ------------------------------------------------------------------
    describe('local scopes', () => {
        it('does not report parameters or locals', () => {
            assert.deepEqual(usage('def f(a, *rest, **kw):\n    b = a\n    return b, rest, kw\n'), []);
        });

        it('reads names that functions take from the module', () => {
            assert.deepEqual(usage('def f():\n    return helper()\n'), ['helper']);
        });

        it('treats a name assigned later in a function as local to all of it', () => {
            assert.deepEqual(usage('def f():\n    print(value)\n    value = 1\n'), []);
        });

        it('hides class attributes from methods', () => {
            assert.deepEqual(usage('class A:\n    size = 1\n    def f(self):\n        return size\n'), ['size']);
        });

        it('sees class attributes from the class body itself', () => {
            assert.deepEqual(usage('class A:\n    size = 1\n    double = size * 2\n'), []);
        });

        it('follows nonlocal to the enclosing function', () => {
            assert.deepEqual(usage('def outer():\n    n = 0\n    def inner():\n        nonlocal n\n        n += 1\n'), []);
        });

        it('counts default values and decorators in the enclosing scope', () => {
            assert.deepEqual(usage('@register\ndef f(x=DEFAULT):\n    return x\n'), ['DEFAULT', 'register']);
        });

        it('binds lambda parameters', () => {
            assert.deepEqual(usage('key = lambda item: item.name\n'), []);
        });
    });

    // ------------------------------------------------------------------
    // Comprehensions
    // ------------------------------------------------------------------
    describe('comprehensions', () => {
        it('binds comprehension targets locally', () => {
            assert.deepEqual(usage('total = [x * 2 for x in values if x]\n'), ['values']);
        });

        it('keeps comprehension variables out of the module', () => {
            assert.deepEqual(usage('squares = [n for n in range(3)]\nprint(n)\n'), ['n']);
        });

        it('binds walrus targets in the enclosing scope', () => {
            assert.deepEqual(usage('if any((hit := x) for x in items):\n    print(hit)\n'), ['items']);
        });

        it('evaluates the first iterable of a class-level comprehension in the class', () => {
            assert.deepEqual(usage('class A:\n    names = ["a"]\n    upper = [n.upper() for n in names]\n'), []);
        });
    });

    // ------------------------------------------------------------------
    // Annotations and strings
    // ------------------------------------------------------------------
    describe('annotations', () => {
        it('reads names inside string annotations', () => {
            assert.deepEqual(usage('def f(node: "Tree[Leaf]") -> "Leaf":\n    return node\n'), ['Leaf', 'Tree']);
        });

        it('does not read Literal arguments as names', () => {
            assert.deepEqual(usage('from typing import Literal\nMode = Literal["fast", "slow"]\nx: Literal["Color"] = "a"\n'), []);
        });

        it('reads names in f-string fields', () => {
            assert.deepEqual(usage('message = f"{greeting}, {person.name!r:>{width}}"\n'), ['greeting', 'person', 'width']);
        });

        it('treats bare module-level annotations as reads of the annotation only', () => {
            assert.deepEqual(usage('answer: Number\nprint(answer)\n'), ['Number', 'answer']);
        });

        it('binds PEP 695 type parameters', () => {
            assert.deepEqual(usage('def first[T](items: list[T]) -> T:\n    return items[0]\n'), []);
        });
    });

    // ------------------------------------------------------------------
    // __all__
    // ------------------------------------------------------------------
    describe('__all__ entries', () => {
        it('counts re-exported names as uses', () => {
            assert.deepEqual(usage('from .models import *\n__all__ = ["User", "local"]\nlocal = 1\n'), ['User']);
        });
    });

    describe('collectUsageSites', () => {
        it('maps each name to its first use', () => {
            const sites = collectUsageSites(createSourceFile('/project/t.py', 'a = b\nc = b\n'));
            assert.deepEqual([...sites], [['b', { span: { start: 4, end: 5 }, optional: false }]]);
        });
    });

    describe('analyzeScopes', () => {
        it('hoists global assignments into the module scope', () => {
            const analysis = analyzeScopes(parseModule('def setup():\n    global ready\n    ready = True\n'));
            assert.deepEqual([...(analysis.module.bindings.get('ready') ?? [])], ['assignment']);
            assert.equal(analysis.module.children[0].bindings.has('ready'), false);
        });
    });
});
