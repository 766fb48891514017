import test from 'ava'
import { TR64ErrorCode } from './errors'
import type { TR64Error } from './errors'
import { childText, extractFault, findChildren, parseXml, walk } from './xml'
import { soapFault } from './testdata/helpers'

test('parses elements without namespace prefixes', async t => {
  const root = await parseXml(
    '<s:Envelope xmlns:s="urn:test"><s:Body a="1"><Value>42</Value><value>43</value></s:Body></s:Envelope>'
  )
  t.is(root.name, 'Envelope')
  const body = root.children[0]
  t.is(body.name, 'Body')
  t.deepEqual(body.attributes, { a: '1' })
  t.is(childText(body, 'value'), '42')
  t.is(findChildren(body, 'VALUE').length, 2)
})

test('keeps the order of children and ignores whitespace between them', async t => {
  const root = await parseXml('<list>\n  <b>2</b>\n  <a>1</a>\n  <b/>\n</list>')
  t.deepEqual(
    root.children.map(child => [child.name, child.text]),
    [
      ['b', '2'],
      ['a', '1'],
      ['b', ''],
    ]
  )
  t.is(root.text, '')
})

test('walks through all descendants in document order', async t => {
  const root = await parseXml('<a><b><c/></b><d/></a>')
  t.deepEqual(
    Array.from(walk(root)).map(element => element.name),
    ['a', 'b', 'c', 'd']
  )
})

test('fails with context on invalid xml', async t => {
  const error = await t.throwsAsync<TR64Error>(parseXml('<a><b></a>', 'Broken'), {
    message: /^Broken: /,
  })
  t.is(error?.code, TR64ErrorCode.InvalidXml)
})

test('fails on an empty document', async t => {
  const error = await t.throwsAsync<TR64Error>(parseXml('', 'Nothing'))
  t.is(error?.code, TR64ErrorCode.InvalidXml)
})

test('extracts the error text and upnp error of a fault', async t => {
  const fault = await extractFault(soapFault(714, 'NoSuchEntryInArray'))
  t.deepEqual(fault, {
    text: 'UPnPError NoSuchEntryInArray ',
    upnpErrorCode: 714,
    upnpErrorDescription: 'NoSuchEntryInArray',
  })
})

test('extracts nothing out of a body without xml', async t => {
  t.deepEqual(await extractFault('Unauthorized'), { text: '' })
})
