/**
 * Causal Rules
 * The fixed rule table, in evaluation order
 */

import { METRIC_KEYS as K } from '../metrics/types.js';
import type { CausalRule, CausalStep } from './types.js';

function cause(text: string): CausalStep {
  return { kind: 'CAUSE', text };
}

function effect(text: string): CausalStep {
  return { kind: 'EFFECT', text };
}

function root(text: string): CausalStep {
  return { kind: 'ROOT', text };
}

export const WEAR_BEFORE_FALLBACK = 'wear-before-fallback';
export const METER_BEFORE_EICHRECHT = 'meter-before-eichrecht';

export const CAUSAL_RULES: readonly CausalRule[] = [
  {
    id: 'network-cloud-cascade',
    name: 'Network→Cloud Cascade',
    severity: 'CRITICAL',
    trigger: (m) => m.text(K.pppStatus) === 'down' && m.int(K.mqttFailCount) > 0,
    steps: ({ metrics: m }) => {
      const mqttFail = m.int(K.mqttFailCount);
      const backoff = m.int(K.mqttBackoffCount);
      const bootRejected = m.int(K.ocppBootNotifications) - m.int(K.ocppBootAccepted);

      const steps = [
        cause('PPP/Cellular connection never established'),
        effect('No backup WAN link available'),
        effect(`MQTT connection unstable (${mqttFail} failures, falling back to Ethernet)`),
      ];
      if (backoff > 0) {
        steps.push(effect(`Connection backoff triggered ${backoff} times`));
      }
      if (bootRejected > 0) {
        steps.push(effect(`OCPP BootNotification rejected/timeout ${bootRejected} times`));
      }
      steps.push(root('Check SIM card, APN configuration, modem hardware, cellular coverage'));
      return steps;
    },
  },
  {
    id: 'ethernet-instability',
    name: 'Ethernet Instability Cascade',
    severity: 'HIGH',
    trigger: (m) => m.int(K.ethFlapCycles) > 2,
    steps: ({ metrics: m }) => [
      cause(`Ethernet link flapping (${m.int(K.ethFlapCycles)} cycles)`),
      effect('Network stability checks triggered repeatedly'),
      effect('DNS resolution intermittent during flap events'),
      effect('OCPP/MQTT connections disrupted during transitions'),
      root('Check Ethernet cable, switch port, PHY negotiation settings'),
    ],
  },
  {
    id: 'certificate-auth-cascade',
    name: 'Certificate→Authentication Cascade',
    severity: 'HIGH',
    trigger: (m) => m.int(K.certLoadFailures) > 5 && m.int(K.ocppCertIssues) > 0,
    steps: ({ metrics: m }) => {
      const bootRejected = m.int(K.ocppBootNotifications) - m.int(K.ocppBootAccepted);
      const steps = [
        cause(`Certificate load failures (${m.int(K.certLoadFailures)})`),
        effect(`OCPP certificate delivery issues (${m.int(K.ocppCertIssues)})`),
      ];
      if (bootRejected > 5) {
        steps.push(effect(`BootNotification acceptance delayed (${bootRejected} rejected before success)`));
      }
      steps.push(root('Check certificate slots, storage integrity, certificate validity dates'));
      return steps;
    },
  },
  {
    id: 'hardware-charging-cascade',
    name: 'Hardware→Charging Cascade',
    severity: 'HIGH',
    trigger: (m) => m.int(K.cpStateFaults) > 0 && m.int(K.evccWatchdogCount) > 50,
    steps: ({ metrics: m }) => [
      cause(`CPState faults from PowerBoard (${m.int(K.cpStateFaults)})`),
      effect(`EVCC watchdog triggered repeatedly (${m.int(K.evccWatchdogCount)} times)`),
      effect('Charging sessions may be interrupted or prevented'),
      root('Check PowerBoard firmware, connector wiring, pilot signal circuit'),
    ],
  },
  {
    id: 'reboot-instability',
    name: 'Reboot Instability',
    severity: 'HIGH',
    trigger: (m) => m.int(K.rebootCount) > 10,
    steps: ({ metrics: m }) => {
      const serviceDown = m.int(K.serviceDownCount);
      const gpioFailures = m.int(K.gpioFailures);

      const steps = [cause(`${m.int(K.rebootCount)} reboots detected across ${m.int(K.bootCount)} boot cycles`)];
      if (serviceDown > 0) {
        steps.push(effect(`${serviceDown} service-down events between reboots`));
      }
      steps.push(effect('All connections and sessions reset on each reboot'));
      if (gpioFailures > 0) {
        steps.push(effect(`GPIO failures (${gpioFailures}) suggest hardware watchdog involvement`));
      }
      steps.push(root('Check panic logs, watchdog timeout configuration, power supply stability'));
      return steps;
    },
  },
  {
    id: 'pmq-breakdown',
    name: 'PMQ Communication Breakdown',
    severity: 'MEDIUM',
    trigger: (m) => m.int(K.pmqSubscriptionFailures) > 3 || m.int(K.pmqQueueOverflows) > 0,
    steps: ({ metrics: m }) => {
      const threadAlarms = m.int(K.pmqThreadAlarms);
      const steps = [
        cause(
          `PMQ subscription failures (${m.int(K.pmqSubscriptionFailures)}) / ` +
            `queue overflow (${m.int(K.pmqQueueOverflows)})`
        ),
      ];
      if (threadAlarms > 0) {
        steps.push(effect(`PMQ thread alarms (${threadAlarms}): processing backlog`));
      }
      steps.push(
        effect('EnergyManager may not receive power limit updates from ChargePoint PMQ'),
        effect('ErrorBoss_PMQ may miss error injection/reports from EVIC'),
        effect('OCPP_PMQ may not receive StatusNotification triggers'),
        effect('Charging flow control (EVPLCCom_PMQ) may lose sync with state machine'),
        root('Check PMQ queue sizes (/dev/mqueue), component startup order, POSIX queue limits (fs.mqueue.msg_max)')
      );
      return steps;
    },
  },
  {
    id: 'thermal-power-cascade',
    name: 'Thermal→Power Cascade',
    severity: 'HIGH',
    trigger: (m) => m.int(K.tempDerating) > 0 || m.int(K.tempCritical) > 0,
    steps: ({ metrics: m }) => {
      const critical = m.int(K.tempCritical);
      const derating = m.int(K.tempDerating);
      const maxDerating = m.int(K.tempMaxDerating);

      const steps: CausalStep[] = [];
      if (critical > 0) {
        steps.push(cause(`Critical temperature errors (${critical}): hardware overheating`));
      }
      if (derating > 0) {
        steps.push(cause(`Temperature derating activated (${derating} events)`));
      }
      steps.push(effect('Charging power output reduced (TemperatureDerating module)'));
      if (maxDerating > 0) {
        steps.push(effect(`MaximalDeratingReached (${maxDerating}) blocks ALL sessions, charger at thermal limit`));
      }
      steps.push(
        effect('EnergyManager power balancing affected, slower charging'),
        root('Check cooling system, ventilation, ambient temperature, wiring connections, enclosure airflow')
      );
      return steps;
    },
  },
  {
    id: 'storage-degradation',
    name: 'Storage Degradation Cascade',
    severity: 'CRITICAL',
    trigger: (m) => m.int(K.storageFallback) > 0 || m.int(K.fsReadOnly) > 0,
    preconditions: [
      {
        id: WEAR_BEFORE_FALLBACK,
        before: /eMMC|EmmcHigh|Wearing/,
        after: /Fallback|fallback|ReadOnly|SwitchToRO/,
        mode: 'annotate',
      },
    ],
    steps: ({ metrics: m, precedence }) => {
      const wear = m.int(K.emmcWear);
      const readOnly = m.int(K.fsReadOnly);
      const fallback = m.int(K.storageFallback);

      const steps: CausalStep[] = [];
      if (wear > 0) {
        const note = precedence[WEAR_BEFORE_FALLBACK]?.confirmed
          ? ' (temporal order confirmed: wear → fallback)'
          : '';
        steps.push(cause(`eMMC wearing alerts (${wear}): flash memory degrading${note}`));
      }
      if (readOnly > 0) {
        steps.push(effect(`Filesystem switched to read-only (${readOnly}): data and config partitions affected`));
      }
      if (fallback > 0) {
        steps.push(effect(`StorageFallbackMode active (${fallback}) blocks ALL sessions`));
      }
      steps.push(
        effect('Configs cannot be updated, logs cannot be written, OCPP offline queue unusable'),
        effect('Firmware updates impossible in fallback mode'),
        root('Replace Main AC board (eMMC is soldered). Power cycle may temporarily clear fallback.')
      );
      return steps;
    },
  },
  {
    id: 'meter-eichrecht-billing',
    name: 'Meter→Eichrecht→Billing Cascade',
    severity: 'CRITICAL',
    trigger: (m) =>
      m.int(K.meterMissingCritical) > 0 && m.int(K.eichrechtTerminal) + m.int(K.eichrechtUnavailable) > 0,
    preconditions: [
      {
        id: METER_BEFORE_EICHRECHT,
        before: /Meter|meter/,
        after: /Eichrecht|EICHRECHT/,
        mode: 'require',
        measureGap: true,
      },
    ],
    steps: ({ metrics: m, precedence }) => {
      const order = precedence[METER_BEFORE_EICHRECHT];
      const terminal = m.int(K.eichrechtTerminal);
      const unavailable = m.int(K.eichrechtUnavailable);
      const note = order?.confirmed
        ? ` (temporal order confirmed: meter → Eichrecht after ${order.gapMinutes} min)`
        : '';

      const steps = [
        cause(`RequiredMeterMissing (${m.int(K.meterMissingCritical)}): meter communication lost${note}`),
      ];
      if (terminal > 0) {
        steps.push(effect(`EICHRECHT_ERROR_STATE_TERMINAL (${terminal}): fatal metering state`));
      }
      if (unavailable > 0) {
        steps.push(effect(`EICHRECHT_ERROR_STATE_UNAVAILABLE (${unavailable}): metering unavailable`));
      }
      steps.push(
        effect('Billing records invalid, legal compliance violated'),
        effect('All sessions blocked until meter restored'),
        root('Check meter wiring (RS485), Modbus address, verify Meter.preferred.type in ChargerApp properties')
      );
      return steps;
    },
  },
  {
    id: 'v2g-hlc-breakdown',
    name: 'V2G/HLC Communication Breakdown',
    severity: 'HIGH',
    trigger: (m) => m.int(K.v2gErrors) > 3 && m.int(K.v2gTimeouts) > 3,
    steps: ({ metrics: m }) => {
      const certIssues = m.int(K.v2gCertIssues);
      const steps = [cause(`V2G protocol errors (${m.int(K.v2gErrors)}) + timeouts (${m.int(K.v2gTimeouts)})`)];
      if (certIssues > 0) {
        steps.push(cause(`V2G certificate issues (${certIssues}): Plug&Charge affected`));
      }
      steps.push(
        effect('ISO 15118 sessions failing, fallback to IEC 61851 basic charging'),
        effect('DC charging may be completely blocked (CableCheck/Precharge failures)'),
        effect('ChargingFlowCtrl and EVPLCCom_PMQ reporting errors to ErrorBoss'),
        root('Check SLAC/PLC communication, V2G certificates, vehicle compatibility, digitalCommunicationTimeout_ms')
      );
      return steps;
    },
  },
];
