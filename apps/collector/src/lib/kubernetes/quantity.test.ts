import test from 'node:test';
import assert from 'node:assert/strict';
import { parseCpuMillicores, parseMemoryBytes, parseQuantity } from './quantity.ts';

test('parseCpuMillicores: 整核、小数核与 m 后缀', () => {
  assert.equal(parseCpuMillicores('4'), 4000);
  assert.equal(parseCpuMillicores('0.5'), 500);
  assert.equal(parseCpuMillicores('0.1'), 100);
  assert.equal(parseCpuMillicores('250m'), 250);
  assert.equal(parseCpuMillicores('3500m'), 3500);
});

test('parseCpuMillicores: metrics-server 的 n/u 后缀向上取整', () => {
  assert.equal(parseCpuMillicores('1500000n'), 2);
  assert.equal(parseCpuMillicores('250000000n'), 250);
  assert.equal(parseCpuMillicores('123456789n'), 124);
  assert.equal(parseCpuMillicores('2500u'), 3);
});

test('parseMemoryBytes: 二进制与十进制后缀', () => {
  assert.equal(parseMemoryBytes('1024'), 1024);
  assert.equal(parseMemoryBytes('1024Ki'), 1_048_576);
  assert.equal(parseMemoryBytes('512Mi'), 536_870_912);
  assert.equal(parseMemoryBytes('2Gi'), 2_147_483_648);
  assert.equal(parseMemoryBytes('1G'), 1_000_000_000);
  assert.equal(parseMemoryBytes('1.5Ki'), 1536);
  assert.equal(parseMemoryBytes('128974848'), 128_974_848);
});

test('parseQuantity: 支持科学计数法', () => {
  assert.equal(parseQuantity('1e3'), 1000);
  assert.equal(parseQuantity('12E2'), 1200);
});

test('parseQuantity: 非法输入抛出错误', () => {
  assert.throws(() => parseQuantity(''), /无法解析 quantity/);
  assert.throws(() => parseQuantity('abc'), /无法解析 quantity/);
  assert.throws(() => parseQuantity('12Xi'), /无法解析 quantity/);
});
