import { Test } from '@nestjs/testing';
import { CareKind, createSymptomQuery, Severity, TriageState } from '../../utils/types';
import { ReasoningService } from '../reasoning/reasoning.service';
import { RetrievalService } from '../retrieval/retrieval.service';
import { SessionStoreService } from '../session/session-store.service';
import { FakeGemini, triagePipelineProviders } from './triage.fixtures';
import { TriageService } from './triage.service';

describe('TriageService', () => {
  let triage: TriageService;
  let sessions: SessionStoreService;
  let retrieval: RetrievalService;
  let reasoning: ReasoningService;
  let gemini: FakeGemini;

  beforeEach(async () => {
    gemini = new FakeGemini();
    const moduleRef = await Test.createTestingModule({ providers: triagePipelineProviders(gemini) }).compile();

    triage = moduleRef.get(TriageService);
    sessions = moduleRef.get(SessionStoreService);
    retrieval = moduleRef.get(RetrievalService);
    reasoning = moduleRef.get(ReasoningService);
  });

  it('routes crushing chest pain to emergency care', async () => {
    const query = createSymptomQuery('s1', 'I have severe crushing chest pain radiating to my left arm, sweating');

    const response = await triage.triage(query);

    expect(response.success).toBe(true);
    expect(response.decision?.kind).toBe(CareKind.Emergency);
    expect(response.reply).toContain('Contact emergency services immediately (call 911)');
    expect(response.retrieval?.chunks[0].id).toBe('chest');
    expect(response.states).toEqual([
      TriageState.Received,
      TriageState.ContextLoaded,
      TriageState.Retrieved,
      TriageState.Analyzed,
      TriageState.Routed,
      TriageState.Completed,
    ]);
    expect(sessions.history('s1')).toHaveLength(1);
  });

  it('routes a mild cold to self-care', async () => {
    const response = await triage.triage(createSymptomQuery('s2', 'mild headache and runny nose, no fever'));

    expect(response.decision?.kind).toBe(CareKind.SelfCare);
    expect(response.decision?.analysis.usedFallback).toBe(true);
  });

  it('answers non-medical questions without retrieval or reasoning', async () => {
    const retrieve = jest.spyOn(retrieval, 'retrieve');
    const analyze = jest.spyOn(reasoning, 'analyze');

    const response = await triage.triage(createSymptomQuery('s3', 'what is the capital of France'));

    expect(response.decision?.kind).toBe(CareKind.NonMedical);
    expect(response.retrieval).toBeNull();
    expect(response.states).toEqual([TriageState.Received, TriageState.ContextLoaded, TriageState.Routed, TriageState.Completed]);
    expect(retrieve).not.toHaveBeenCalled();
    expect(analyze).not.toHaveBeenCalled();
  });

  it.each([
    'my father who is 70 has slurred speech and his face is drooping',
    'my husband who is diabetic just passed out and is unresponsive',
    'I think my mum is having a stroke, who is the nearest hospital',
    'my friend collapsed and is unconscious after the football match',
  ])('routes "%s" to emergency care rather than the non-medical responder', async text => {
    const response = await triage.triage(createSymptomQuery('s8', text));

    expect(response.decision?.kind).toBe(CareKind.Emergency);
    expect(response.decision?.analysis.severity).toBe(Severity.HIGH);
    expect(response.states).toContain(TriageState.Retrieved);
  });

  it('gives the same decision when a query is replayed', async () => {
    const query = createSymptomQuery('s4', 'itchy rash on my elbow for a week');

    const first = await triage.triage(query);
    const second = await triage.triage(query);

    expect(first.decision?.kind).toBe(CareKind.Appointment);
    expect(second.decision?.kind).toBe(first.decision?.kind);
  });

  it('sends a reply without a risk level to an appointment', async () => {
    gemini.configured = true;
    gemini.reply = 'ASSESSMENT: Hard to say from this description.\nRECOMMENDATION: See a GP.';

    const response = await triage.triage(createSymptomQuery('s5', 'tired all the time'));

    expect(response.decision?.kind).toBe(CareKind.Appointment);
    expect(response.decision?.analysis.severityDefaulted).toBe(true);
  });

  it('passes earlier turns to the reasoning step', async () => {
    const analyze = jest.spyOn(reasoning, 'analyze');
    await triage.triage(createSymptomQuery('s6', 'sore throat'));

    await triage.triage(createSymptomQuery('s6', 'now a cough too'));

    expect(analyze.mock.calls[0][3]?.conversationSummary).toBeUndefined();
    expect(analyze.mock.calls[1][3]?.conversationSummary).toContain('Input: sore throat | Response: SELF-CARE RECOMMENDATIONS');
  });

  it('fails safe and records nothing when a stage throws', async () => {
    jest.spyOn(retrieval, 'retrieve').mockRejectedValue(new Error('unexpected'));

    const response = await triage.triage(createSymptomQuery('s7', 'back pain'));

    expect(response.success).toBe(false);
    expect(response.decision).toBeNull();
    expect(response.reply).toContain('call emergency services immediately (911)');
    expect(response.states).toEqual([TriageState.Received, TriageState.ContextLoaded, TriageState.Errored]);
    expect(sessions.history('s7')).toEqual([]);
  });
});
