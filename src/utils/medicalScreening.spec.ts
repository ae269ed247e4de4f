import { findEmergencySignal, isObviouslyNonMedical } from './medicalScreening';

const EMERGENCIES_WITH_OFF_TOPIC_WORDING: Array<[string, string]> = [
  ['my father who is 70 has slurred speech and his face is drooping', 'stroke_signs'],
  ['my husband who is diabetic just passed out and is unresponsive', 'unconscious'],
  ['I think my mum is having a stroke, who is the nearest hospital', 'stroke_signs'],
  ['my friend collapsed and is unconscious after the football match', 'unconscious'],
];

describe('isObviouslyNonMedical', () => {
  it.each(['what is the capital of France', 'Who was Napoleon?', 'recommend a movie for tonight', "what's the weather like"])(
    'flags "%s"',
    text => {
      expect(isObviouslyNonMedical(text)).toBe(true);
    },
  );

  it.each([
    'mild headache and runny nose, no fever',
    'I have severe crushing chest pain radiating to my left arm, sweating',
    'who is the right doctor for back pain',
    'my stomach hurts after watching a movie',
  ])('lets "%s" through', text => {
    expect(isObviouslyNonMedical(text)).toBe(false);
  });

  it.each(EMERGENCIES_WITH_OFF_TOPIC_WORDING)('never screens out the emergency in "%s"', (text, signal) => {
    expect(findEmergencySignal(text)).toBe(signal);
    expect(isObviouslyNonMedical(text)).toBe(false);
  });

  it('finds no emergency signal in everyday complaints', () => {
    expect(findEmergencySignal('mild headache and runny nose')).toBeNull();
  });
});
