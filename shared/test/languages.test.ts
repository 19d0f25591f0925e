import assert from 'node:assert'
import { describe, test } from 'node:test'
import { DEFAULT_SUPPORTED_LANGUAGES, parseLanguageList } from '../src/languages.js'

describe('parseLanguageList', () => {
    test('returns the defaults for empty input', () => {
        assert.deepStrictEqual(parseLanguageList(undefined), [...DEFAULT_SUPPORTED_LANGUAGES])
        assert.deepStrictEqual(parseLanguageList(' , '), [...DEFAULT_SUPPORTED_LANGUAGES])
    })

    test('trims entries and drops duplicates in order', () => {
        assert.deepStrictEqual(parseLanguageList('es, en ,es,zh-Hans'), ['es', 'en', 'zh-Hans'])
    })

    test('default list keeps English first', () => {
        assert.strictEqual(DEFAULT_SUPPORTED_LANGUAGES[0], 'en')
        assert.strictEqual(DEFAULT_SUPPORTED_LANGUAGES.length, 8)
    })
})
