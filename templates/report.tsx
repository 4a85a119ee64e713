import { Document, Header, View, Text, Table, Row, Cell, Break, PageBreak, StyleSheet } from '@pagewright/react';

const styles = StyleSheet.create({
  title: { fontSize: 20, fontWeight: 700, color: '#0f172a' },
  section: { fontSize: 14, fontWeight: 700, color: '#0f172a', paddingBottom: 2 },
  body: { fontSize: 10, color: '#334155' },
  headCell: { padding: 1.5, fontSize: 9, fontWeight: 700, color: '#ffffff' },
  cell: { padding: 1.5, fontSize: 9, color: '#334155' },
});

const regions = [
  { region: 'North', q1: 120, q2: 135, q3: 128, q4: 160 },
  { region: 'South', q1: 98, q2: 104, q3: 117, q4: 121 },
  { region: 'East', q1: 143, q2: 150, q3: 139, q4: 171 },
  { region: 'West', q1: 87, q2: 95, q3: 102, q4: 118 },
];

const findings = [
  'Every region grew year over year, with the strongest fourth quarter in the East.',
  'Returns fell after the packaging change in the second quarter.',
  'The West closed most of its gap to the South during the second half.',
];

export default (
  <Document title="Quarterly Report" paperSize="A4" margin={20} lineSpacing={1.2}>
    <Header>
      <Text style={{ fontSize: 8, color: '#94a3b8', textAlign: 'right' }}>Quarterly Report / Page {'{{pageNumber}}'}</Text>
    </Header>

    <Text style={styles.title}>Quarterly Report</Text>
    <Text style={styles.body}>
      This report summarizes sales by region for the year. Figures are in thousands and rounded to the
      nearest unit. <Text style={{ fontStyle: 'italic' }}>Preliminary figures</Text> for the fourth quarter
      are marked as such in the appendix.
    </Text>
    <Break />

    <Text style={styles.section}>Sales by Region</Text>
    <Table columns={[3, 2, 2, 2, 2, 2]} borders={{ inner: true, outer: true, continuation: true, width: 0.2 }}>
      <Row style={{ backgroundColor: '#0f172a' }}>
        <Cell style={styles.headCell}><Text>Region</Text></Cell>
        <Cell style={styles.headCell}><Text style={{ textAlign: 'right' }}>Q1</Text></Cell>
        <Cell style={styles.headCell}><Text style={{ textAlign: 'right' }}>Q2</Text></Cell>
        <Cell style={styles.headCell}><Text style={{ textAlign: 'right' }}>Q3</Text></Cell>
        <Cell style={styles.headCell}><Text style={{ textAlign: 'right' }}>Q4</Text></Cell>
        <Cell style={styles.headCell}><Text style={{ textAlign: 'right' }}>Total</Text></Cell>
      </Row>
      {regions.map((r, i) => (
        <Row key={r.region} style={{ backgroundColor: i % 2 === 0 ? '#ffffff' : '#f1f5f9' }}>
          <Cell style={styles.cell}><Text>{r.region}</Text></Cell>
          <Cell style={styles.cell}><Text style={{ textAlign: 'right' }}>{r.q1}</Text></Cell>
          <Cell style={styles.cell}><Text style={{ textAlign: 'right' }}>{r.q2}</Text></Cell>
          <Cell style={styles.cell}><Text style={{ textAlign: 'right' }}>{r.q3}</Text></Cell>
          <Cell style={styles.cell}><Text style={{ textAlign: 'right' }}>{r.q4}</Text></Cell>
          <Cell style={styles.cell}>
            <Text style={{ textAlign: 'right', fontWeight: 700 }}>{r.q1 + r.q2 + r.q3 + r.q4}</Text>
          </Cell>
        </Row>
      ))}
    </Table>
    <Break />

    <Text style={styles.section}>Key Findings</Text>
    {findings.map((finding, i) => (
      <View key={i} style={{ paddingLeft: 4, paddingBottom: 1 }}>
        <Text style={styles.body}>{i + 1}. {finding}</Text>
      </View>
    ))}

    <PageBreak />
    <Text style={styles.section}>Appendix</Text>
    <View style={{ padding: 3, borderWidth: 0.3, borderColor: '#cbd5e1' }}>
      <Text style={styles.body}>
        Fourth quarter figures are preliminary until the year-end audit closes. Regional totals include
        returns processed before the reporting cut-off.
      </Text>
    </View>
  </Document>
);
