/** Common spellings of flow features, mapped onto the whitelist names. */
export const TAG_SYNONYMS: Readonly<Record<string, string>> = {
  bytes: "flow_bytes",
  byte_count: "flow_bytes",
  total_bytes: "flow_bytes",
  flow_byte_count: "flow_bytes",
  packet_count: "packets",
  pkts: "packets",
  packets_per_flow: "packets",
  flow_rate: "rate",
  packet_rate: "rate",
  bytes_per_second: "rate",
  inter_arrival_time: "iat",
  interarrival_time: "iat",
  flow_iat: "iat",
  source_ip: "src_ip",
  source_address: "src_ip",
  destination_ip: "dst_ip",
  dest_ip: "dst_ip",
  destination_address: "dst_ip",
  source_port: "src_port",
  sport: "src_port",
  destination_port: "dst_port",
  dest_port: "dst_port",
  dport: "dst_port",
  proto: "protocol",
  ip_protocol: "protocol",
  payload_entropy: "entropy",
  byte_entropy: "entropy",
  payload_length: "payload_len",
  payload_size: "payload_len"
};
