import { GpParameters } from '../params/gp_parameters';
import { OpenPgpPins } from '../params/openpgp_parameters';
import { planReconcile, reconcileOutcome } from './reconcile';

const keyA = new GpParameters({ key: '000102030405060708090A0B0C0D0E0F' });
const keyB = new GpParameters({ key: 'F0E0D0C0B0A090807060504030201000' });

test('nothing desired and nothing on file', () => {
  const plan = planReconcile<GpParameters>({});
  expect(plan).toEqual({ type: 'keep' });
  expect(reconcileOutcome(plan)).toEqual('unchanged');
});

test('nothing desired but a current value', () => {
  const plan = planReconcile({ current: keyA });
  expect(plan).toEqual({ type: 'restore-default', current: keyA });
  expect(reconcileOutcome(plan)).toEqual('restored-default');
});

test('desired value and no current value', () => {
  const plan = planReconcile({ desired: keyA });
  expect(plan).toEqual({ type: 'change', desired: keyA, current: undefined });
  expect(reconcileOutcome(plan)).toEqual('changed');
});

test('desired value differs from the current one', () => {
  expect(planReconcile({ desired: keyB, current: keyA })).toEqual({
    type: 'change',
    desired: keyB,
    current: keyA,
  });
});

test('desired value equals the current one', () => {
  expect(
    planReconcile({
      desired: keyA,
      current: new GpParameters({ key: keyA.key.toLowerCase() }),
    })
  ).toEqual({ type: 'keep' });
});

test('works the same for PINs', () => {
  const pins = OpenPgpPins.factoryDefault();
  expect(planReconcile({ desired: pins, current: pins })).toEqual({
    type: 'keep',
  });
  const current = new OpenPgpPins({ pin: '111111', admin_pin: '22222222' });
  expect(planReconcile({ current }).type).toEqual('restore-default');
});
