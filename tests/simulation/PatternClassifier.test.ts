import { describe, expect, it } from 'vitest';
import { PatternClassifier } from '../../simulation/classifier/PatternClassifier.js';
import { ScriptedClassifier } from '../../simulation/classifier/ScriptedClassifier.js';
import { classPatternSeed, generateSimulatedImage } from '../../simulation/classifier/simulatedImage.js';
import { FOOTBALLER_CLASSES } from '../../simulation/types/simulation.js';

describe('generateSimulatedImage', () => {
  it('fills a byte ramp starting at the class seed', () => {
    expect([...generateSimulatedImage(1, 4)]).toEqual([60, 61, 62, 63]);
  });

  it('wraps the ramp and the seed at 256', () => {
    expect(classPatternSeed(5)).toBe(4);
    expect([...generateSimulatedImage(0, 250)].slice(244)).toEqual([254, 255, 0, 1, 2, 3]);
  });
});

describe('PatternClassifier', () => {
  const classifier = new PatternClassifier(FOOTBALLER_CLASSES);

  it('identifies an untouched image with zero distance', () => {
    expect(classifier.classify(generateSimulatedImage(3, 1000))).toEqual({
      status: 'classified',
      classId: 'mbappe',
      distance: 0,
    });
  });

  it('scales distance with the share of bytes off the ramp', () => {
    const bytes = generateSimulatedImage(0, 10);
    for (let i = 1; i <= 5; i += 1) {
      bytes[i] = (bytes[i] ?? 0) ^ 0xff;
    }

    expect(classifier.classify(bytes)).toEqual({ status: 'classified', classId: 'messi', distance: 100 });
  });

  it('leaves content without a known leading byte unresolved', () => {
    expect(classifier.classify(new Uint8Array(100))).toEqual({ status: 'unresolved' });
    expect(classifier.classify(new Uint8Array(0))).toEqual({ status: 'unresolved' });
  });
});

describe('ScriptedClassifier', () => {
  it('answers by tag and falls back for unknown tags', () => {
    const classifier = new ScriptedClassifier(
      { 'a.jpg': { status: 'classified', classId: 'messi', distance: 5 } },
      { status: 'unresolved', distance: 999 },
    );

    expect(classifier.classify(new Uint8Array(0), 'a.jpg')).toEqual({
      status: 'classified',
      classId: 'messi',
      distance: 5,
    });
    expect(classifier.classify(new Uint8Array(0), 'b.jpg')).toEqual({ status: 'unresolved', distance: 999 });
  });
});
