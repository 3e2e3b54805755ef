import type { ServiceRequest } from '../canon/serviceRequest.js';
import type { RawColumnName, RawRecord } from '../ingress/rawRecord.js';

export function sampleRawServiceRequest(
  overrides: Partial<Record<RawColumnName, string | null>> = {}
): RawRecord {
  return {
    'Unique Key': '100',
    'Created Date': '03/15/2015 10:00:00 AM',
    'Closed Date': '03/15/2015 01:30:00 PM',
    Agency: 'NYPD',
    'Agency Name': 'New York City Police Department',
    'Complaint Type': 'Noise - Residential',
    Descriptor: 'Loud Music/Party',
    'Location Type': 'Residential Building/House',
    'Incident Zip': '11201',
    'Incident Address': '100 EXAMPLE STREET',
    City: 'BROOKLYN',
    Borough: 'BROOKLYN',
    Latitude: '40.6943',
    Longitude: '-73.9903',
    Status: 'Closed',
    'Resolution Description': 'The Police Department responded to the complaint.',
    'Resolution Action Updated Date': '03/15/2015 01:30:00 PM',
    'Community Board': '02 BROOKLYN',
    ...overrides
  };
}

export function sampleServiceRequest(overrides: Partial<ServiceRequest> = {}): ServiceRequest {
  return {
    unique_key: '100',
    created_date_raw: '03/15/2015 10:00:00 AM',
    closed_date_raw: '03/15/2015 01:30:00 PM',
    created_at: '2015-03-15T10:00:00',
    closed_at: '2015-03-15T13:30:00',
    agency: 'NYPD',
    agency_name: 'New York City Police Department',
    complaint_type: 'Noise - Residential',
    complaint_category: 'Noise - Residential',
    descriptor: 'Loud Music/Party',
    location_type: 'Residential Building/House',
    incident_zip: '11201',
    incident_address: '100 EXAMPLE STREET',
    city: 'BROOKLYN',
    borough: 'BROOKLYN',
    latitude: 40.6943,
    longitude: -73.9903,
    status: 'Closed',
    resolution_description: 'The Police Department responded to the complaint.',
    resolution_action_date: '03/15/2015 01:30:00 PM',
    community_board: '02 BROOKLYN',
    response_time_hours: 3.5,
    has_valid_borough: true,
    has_valid_coordinates: true,
    has_valid_created_date: true,
    has_closed_date: true,
    ...overrides
  };
}
